export { WebhookController } from './webhook.controller';
export { OrdersController } from './orders.controller';
export { HealthController } from './health.controller';
