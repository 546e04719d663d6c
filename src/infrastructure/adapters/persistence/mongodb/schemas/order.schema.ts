import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Mongoose document for one line of a placed order.
 * The unit price is copied from the catalog when the line is written,
 * so later menu changes do not alter past orders.
 */
@Schema({
  collection: 'orders',
  timestamps: { createdAt: true, updatedAt: false },
})
export class OrderLineDocument {
  @Prop({ required: true })
  orderId!: number;

  @Prop({ required: true })
  itemName!: string;

  @Prop({ required: true, min: 1 })
  quantity!: number;

  @Prop({ required: true })
  unitPriceCents!: number;

  @Prop({ required: true, default: 'USD' })
  currency!: string;

  // Managed by timestamps
  createdAt!: Date;
}

export type OrderLineDocumentType = HydratedDocument<OrderLineDocument>;
export const OrderLineSchema = SchemaFactory.createForClass(OrderLineDocument);

OrderLineSchema.index({ orderId: 1 });

/**
 * Mongoose document for an order's tracking record.
 * Its presence is what makes an order id known to tracking lookups.
 */
@Schema({
  collection: 'order_tracking',
  timestamps: true,
  _id: false, // The order id is the _id
})
export class OrderTrackingDocument {
  @Prop({ type: Number, required: true })
  _id!: number;

  @Prop({ required: true })
  status!: string;

  createdAt!: Date;

  updatedAt!: Date;
}

export type OrderTrackingDocumentType = HydratedDocument<OrderTrackingDocument>;
export const OrderTrackingSchema = SchemaFactory.createForClass(OrderTrackingDocument);
