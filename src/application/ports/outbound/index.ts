export { ISessionStorePort } from './session-store.port';
export { IOrderRepositoryPort } from './order-repository.port';
export { IFoodItemRepositoryPort } from './food-item-repository.port';

// Injection tokens
export const SESSION_STORE = 'ISessionStore';
export const ORDER_REPOSITORY = 'IOrderRepository';
export const FOOD_ITEM_REPOSITORY = 'IFoodItemRepository';
