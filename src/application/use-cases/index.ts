export { AddToOrderUseCase } from './add-to-order.use-case';
export { RemoveFromOrderUseCase } from './remove-from-order.use-case';
export { CompleteOrderUseCase } from './complete-order.use-case';
export { TrackOrderUseCase } from './track-order.use-case';
export { CancelOrderUseCase } from './cancel-order.use-case';
export { IntentRouterUseCase, INTENT_BINDINGS } from './intent-router.use-case';
