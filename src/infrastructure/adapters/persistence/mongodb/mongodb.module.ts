import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { FOOD_ITEM_REPOSITORY, ORDER_REPOSITORY } from '@application/ports/outbound';
import { LoggerModule } from '@infrastructure/observability/logging/logger.module';
import { MetricsModule } from '@infrastructure/observability/metrics/metrics.module';
import {
  CounterDocument,
  CounterSchema,
  FoodItemDocument,
  FoodItemSchema,
  OrderLineDocument,
  OrderLineSchema,
  OrderTrackingDocument,
  OrderTrackingSchema,
} from './schemas';
import { MongoFoodItemRepository, MongoOrderRepository } from './repositories';

/**
 * Module that configures MongoDB persistence layer.
 *
 * Registers the order, tracking, counter and catalog schemas and binds the
 * repositories to their port tokens.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject(ORDER_REPOSITORY)
 *   private readonly orderRepository: IOrderRepositoryPort,
 * ) {}
 * ```
 */
@Module({
  imports: [
    LoggerModule,
    MetricsModule,
    MongooseModule.forFeature([
      { name: OrderLineDocument.name, schema: OrderLineSchema },
      { name: OrderTrackingDocument.name, schema: OrderTrackingSchema },
      { name: CounterDocument.name, schema: CounterSchema },
      { name: FoodItemDocument.name, schema: FoodItemSchema },
    ]),
  ],
  providers: [
    {
      provide: ORDER_REPOSITORY,
      useClass: MongoOrderRepository,
    },
    {
      provide: FOOD_ITEM_REPOSITORY,
      useClass: MongoFoodItemRepository,
    },
  ],
  exports: [ORDER_REPOSITORY, FOOD_ITEM_REPOSITORY],
})
export class MongoDBModule {}
