import { FoodItem } from '@domain/entities';
import { Money } from '@domain/value-objects';
import { FoodItemDocument } from '../schemas';

export class FoodItemMapper {
  static toDomain(document: FoodItemDocument): FoodItem {
    return FoodItem.create({
      name: document.name,
      price: Money.fromCents(document.priceCents, document.currency),
    });
  }

  static toDocument(item: FoodItem): FoodItemDocument {
    const document = new FoodItemDocument();
    document.name = item.name;
    document.priceCents = item.price.cents;
    document.currency = item.price.currency;
    return document;
  }
}
