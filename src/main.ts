import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EnvConfigService } from '@infrastructure/config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Route Nest's own Logger (used by use cases and controllers) through pino
  const logger = app.get(Logger);
  app.useLogger(logger);

  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: false, // The agent sends many fields we do not read
      transform: true,
    }),
  );

  const config = new DocumentBuilder()
    .setTitle('Food Order Webhook API')
    .setDescription(
      `Fulfillment webhook for a conversational food-ordering agent.

- Add, remove, complete and cancel the order of an agent session
- Track placed orders by id
- Read placed orders and service health`,
    )
    .setVersion('1.0')
    .addTag('Webhook', 'Agent fulfillment requests')
    .addTag('Orders', 'Placed orders')
    .addTag('Health', 'Application health monitoring')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      docExpansion: 'list',
      filter: true,
      showRequestDuration: true,
    },
  });

  const port = app.get(EnvConfigService).port;
  await app.listen(port);

  logger.log(`Listening on http://localhost:${port} (docs at /api/docs, metrics at /metrics)`);
}

void bootstrap();
