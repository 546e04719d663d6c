import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { FoodItem } from '@domain/entities';
import { IFoodItemRepositoryPort } from '@application/ports/outbound';
import { FoodItemDocument, FoodItemDocumentType } from '../schemas';
import { FoodItemMapper } from '../mappers';

/**
 * MongoDB repository for the food catalog.
 * Names are matched exactly, the same way line items reference them.
 */
@Injectable()
export class MongoFoodItemRepository implements IFoodItemRepositoryPort {
  constructor(
    @InjectModel(FoodItemDocument.name)
    private readonly foodItemModel: Model<FoodItemDocumentType>,
  ) {}

  async findByName(name: string): Promise<FoodItem | null> {
    const document = await this.foodItemModel.findOne({ name });

    if (!document) {
      return null;
    }

    return FoodItemMapper.toDomain(document);
  }

  async findAll(): Promise<FoodItem[]> {
    const documents = await this.foodItemModel.find().sort({ name: 1 });
    return documents.map((doc) => FoodItemMapper.toDomain(doc));
  }

  /**
   * Upserts by name in a single bulk write.
   */
  async saveMany(items: FoodItem[]): Promise<number> {
    if (items.length === 0) {
      return 0;
    }

    const operations = items.map((item) => {
      const document = FoodItemMapper.toDocument(item);
      return {
        updateOne: {
          filter: { name: document.name },
          update: {
            $set: {
              priceCents: document.priceCents,
              currency: document.currency,
            },
          },
          upsert: true,
        },
      };
    });

    const result = await this.foodItemModel.bulkWrite(operations);
    return result.upsertedCount + result.matchedCount;
  }

  async deleteAll(): Promise<number> {
    const result = await this.foodItemModel.deleteMany({});
    return result.deletedCount;
  }
}
