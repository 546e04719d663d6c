import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for a menu entry.
 */
@Schema({
  collection: 'food_items',
  timestamps: true,
})
export class FoodItemDocument {
  @Prop({ required: true, unique: true })
  name!: string;

  @Prop({ required: true, min: 1 })
  priceCents!: number;

  @Prop({ required: true, default: 'USD' })
  currency!: string;

  createdAt!: Date;

  updatedAt!: Date;
}

export type FoodItemDocumentType = HydratedDocument<FoodItemDocument>;
export const FoodItemSchema = SchemaFactory.createForClass(FoodItemDocument);
