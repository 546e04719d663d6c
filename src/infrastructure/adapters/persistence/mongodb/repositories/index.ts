export { MongoOrderRepository } from './mongo-order.repository';
export { MongoFoodItemRepository } from './mongo-food-item.repository';
