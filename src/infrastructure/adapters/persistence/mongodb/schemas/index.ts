export {
  OrderLineDocument,
  OrderLineDocumentType,
  OrderLineSchema,
  OrderTrackingDocument,
  OrderTrackingDocumentType,
  OrderTrackingSchema,
} from './order.schema';

export { CounterDocument, CounterDocumentType, CounterSchema } from './counter.schema';

export { FoodItemDocument, FoodItemDocumentType, FoodItemSchema } from './food-item.schema';
