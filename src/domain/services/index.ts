export { OrderAggregatorService, RemovalOutcome } from './order-aggregator.service';
