export { OrderMapper } from './order.mapper';
export { FoodItemMapper } from './food-item.mapper';
