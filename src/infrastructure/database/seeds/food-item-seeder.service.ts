import { Inject, Injectable, Logger } from '@nestjs/common';
import { FOOD_ITEM_REPOSITORY, IFoodItemRepositoryPort } from '@application/ports/outbound';
import { FoodItem } from '@domain/entities';
import { Money } from '@domain/value-objects';
import { FOOD_ITEMS_SEED_DATA, FoodItemSeedData } from './food-items.data';

export interface CatalogStats {
  totalItems: number;
  cheapest: string | null;
  mostExpensive: string | null;
}

/**
 * Service responsible for loading the food catalog.
 */
@Injectable()
export class FoodItemSeederService {
  private readonly logger = new Logger(FoodItemSeederService.name);

  constructor(
    @Inject(FOOD_ITEM_REPOSITORY)
    private readonly foodItemRepository: IFoodItemRepositoryPort,
  ) {}

  /**
   * Upserts every seed item; prices of existing items are overwritten.
   * @returns Number of items written
   */
  async seed(): Promise<number> {
    const items = FOOD_ITEMS_SEED_DATA.map((data) => this.toFoodItem(data));

    this.logger.log(`Saving ${items.length} food items...`);
    const written = await this.foodItemRepository.saveMany(items);
    this.logger.log(`Seeded ${written} food items`);

    return written;
  }

  async clear(): Promise<number> {
    const removed = await this.foodItemRepository.deleteAll();
    this.logger.log(`Cleared ${removed} food items`);
    return removed;
  }

  async reseed(): Promise<number> {
    await this.clear();
    return this.seed();
  }

  async getStats(): Promise<CatalogStats> {
    const items = await this.foodItemRepository.findAll();
    const byPrice = [...items].sort((a, b) => a.price.cents - b.price.cents);
    const cheapest = byPrice[0];
    const mostExpensive = byPrice[byPrice.length - 1];

    return {
      totalItems: items.length,
      cheapest: cheapest ? `${cheapest.name} (${cheapest.price.format()})` : null,
      mostExpensive: mostExpensive
        ? `${mostExpensive.name} (${mostExpensive.price.format()})`
        : null,
    };
  }

  private toFoodItem(data: FoodItemSeedData): FoodItem {
    return FoodItem.create({
      name: data.name,
      price: Money.fromCents(data.priceCents),
    });
  }
}
