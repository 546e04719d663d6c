import { Module } from '@nestjs/common';
import { APP_GUARD, APP_INTERCEPTOR } from '@nestjs/core';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { HttpModule } from '@infrastructure/http/http.module';
import { LoggerModule } from '@infrastructure/observability/logging/logger.module';
import {
  MetricsInterceptor,
  MetricsModule,
} from '@infrastructure/observability/metrics';

@Module({
  imports: [
    // Validated environment, available everywhere through EnvConfigService
    ConfigModule,

    LoggerModule,

    MongooseModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService) => ({
        uri: config.mongoUri,
      }),
    }),

    ThrottlerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService) => [config.throttle],
    }),

    MetricsModule,
    HttpModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    { provide: APP_INTERCEPTOR, useClass: MetricsInterceptor },
  ],
})
export class AppModule {}
