/**
 * Built-in menu loaded by the `seed` command.
 * Names must match the agent's `food-item` entity values exactly.
 */
export interface FoodItemSeedData {
  name: string;
  priceCents: number;
}

export const FOOD_ITEMS_SEED_DATA: FoodItemSeedData[] = [
  { name: 'Pav Bhaji', priceCents: 600 },
  { name: 'Chole Bhature', priceCents: 700 },
  { name: 'Pizza', priceCents: 800 },
  { name: 'Mango Lassi', priceCents: 500 },
  { name: 'Masala Dosa', priceCents: 600 },
  { name: 'Vegetable Biryani', priceCents: 900 },
  { name: 'Vada Pav', priceCents: 400 },
  { name: 'Rava Dosa', priceCents: 700 },
  { name: 'Samosa', priceCents: 500 },
  { name: 'Pasta', priceCents: 750 },
];
