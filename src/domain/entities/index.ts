export { InProgressOrder } from './in-progress-order.entity';
export { PlacedOrder } from './placed-order.entity';
export { FoodItem } from './food-item.entity';
