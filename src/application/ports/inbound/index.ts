// Session order ports
export {
  IAddToOrderPort,
  IRemoveFromOrderPort,
  ICompleteOrderPort,
  ICancelOrderPort,
} from './manage-session-order.port';

// Tracking port
export { ITrackOrderPort } from './track-order.port';

// Webhook entry point
export { IIntentRouterPort } from './intent-router.port';
