// Module
export { MongoDBModule } from './mongodb.module';

// Repositories
export { MongoOrderRepository, MongoFoodItemRepository } from './repositories';

// Schemas
export {
  OrderLineDocument,
  OrderLineSchema,
  OrderTrackingDocument,
  OrderTrackingSchema,
  CounterDocument,
  CounterSchema,
  FoodItemDocument,
  FoodItemSchema,
} from './schemas';

// Mappers
export { OrderMapper, FoodItemMapper } from './mappers';
