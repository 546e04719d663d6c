import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

/**
 * Named sequence, incremented atomically with `$inc`.
 */
@Schema({ collection: 'counters', _id: false, versionKey: false })
export class CounterDocument {
  @Prop({ type: String, required: true })
  _id!: string;

  @Prop({ required: true, default: 0 })
  seq!: number;
}

export type CounterDocumentType = HydratedDocument<CounterDocument>;
export const CounterSchema = SchemaFactory.createForClass(CounterDocument);
