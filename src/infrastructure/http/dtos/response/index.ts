export { WebhookResponseDto } from './webhook-response.dto';
export { OrderDetailsDto, OrderLineDetailsDto } from './order-details.dto';
export {
  HealthServicesDto,
  HealthStatusDto,
  MongoHealthDto,
  ReadinessDto,
  SessionsHealthDto,
} from './health-status.dto';
