import { Module } from '@nestjs/common';
import { MongoDBModule, SessionStoreModule } from '@infrastructure/adapters';
import { LoggerModule } from '@infrastructure/observability/logging/logger.module';
import { MetricsModule } from '@infrastructure/observability/metrics/metrics.module';
import {
  AddToOrderUseCase,
  CancelOrderUseCase,
  CompleteOrderUseCase,
  IntentRouterUseCase,
  RemoveFromOrderUseCase,
  TrackOrderUseCase,
} from '@application/use-cases';
import { HealthController, OrdersController, WebhookController } from './controllers';

/**
 * HTTP Module that configures all REST API endpoints.
 *
 * Use cases are plain injectable classes; their ports are satisfied by the
 * session store and MongoDB modules through string tokens.
 */
@Module({
  imports: [MongoDBModule, SessionStoreModule, LoggerModule, MetricsModule],
  controllers: [WebhookController, OrdersController, HealthController],
  providers: [
    AddToOrderUseCase,
    RemoveFromOrderUseCase,
    CompleteOrderUseCase,
    TrackOrderUseCase,
    CancelOrderUseCase,
    IntentRouterUseCase,
  ],
})
export class HttpModule {}
