import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ConfigModule, EnvConfigService } from '@infrastructure/config';
import { LoggerModule } from '@infrastructure/observability/logging/logger.module';
import { SeedsModule } from '@infrastructure/database/seeds/seeds.module';

/**
 * Root module of the `food-order-cli` binary: configuration, logging and a
 * Mongo connection for the catalog seeding commands. No HTTP server.
 */
@Module({
  imports: [
    ConfigModule,
    LoggerModule,
    MongooseModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: (config: EnvConfigService) => ({
        uri: config.mongoUri,
        serverSelectionTimeoutMS: 30000,
      }),
    }),
    SeedsModule,
  ],
})
export class CliModule {}
