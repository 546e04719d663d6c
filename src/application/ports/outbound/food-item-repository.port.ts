import { FoodItem } from '@domain/entities';

export interface IFoodItemRepositoryPort {
  findByName(name: string): Promise<FoodItem | null>;

  findAll(): Promise<FoodItem[]>;

  /**
   * Inserts the items, replacing the price of any that already exist.
   *
   * @returns Number of items written
   */
  saveMany(items: FoodItem[]): Promise<number>;

  /**
   * @returns Number of items removed
   */
  deleteAll(): Promise<number>;
}
