export * from './fulfillment.dto';
export * from './order-session.dto';
export * from './webhook-event.dto';
