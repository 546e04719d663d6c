import {
  Body,
  Controller,
  HttpCode,
  HttpException,
  HttpStatus,
  Inject,
  InternalServerErrorException,
  Logger,
  Post,
} from '@nestjs/common';
import { ApiBadRequestResponse, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { IntentRouterUseCase } from '@application/use-cases';
import { IIntentRouterPort } from '@application/ports/inbound';
import { ISessionStorePort, SESSION_STORE } from '@application/ports/outbound';
import { IntentRoutingError } from '@application/errors';
import { AppLoggerService } from '@infrastructure/observability/logging/app-logger.service';
import { MetricsService } from '@infrastructure/observability/metrics/metrics.service';
import { WebhookRequestDto } from '../dtos/request';
import { WebhookResponseDto } from '../dtos/response';

/**
 * Fulfillment webhook for the conversational agent.
 *
 * The agent posts one request per matched intent and reads the returned
 * `fulfillmentText` to the user. Ordering problems (unknown items, no order
 * yet) are answered with 200 and a message; only malformed requests and
 * unknown intents get a 4xx.
 */
@ApiTags('Webhook')
@Controller('api/v1/webhook')
export class WebhookController {
  private readonly logger = new Logger(WebhookController.name);

  constructor(
    @Inject(IntentRouterUseCase)
    private readonly intentRouter: IIntentRouterPort,
    @Inject(SESSION_STORE)
    private readonly sessionStore: ISessionStorePort,
    private readonly appLogger: AppLoggerService,
    private readonly metrics: MetricsService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Handle an agent fulfillment request',
    description: `Dispatches on queryResult.intent.displayName. The session id is read from
    the first output context name (.../sessions/<id>/contexts/...).`,
  })
  @ApiResponse({ status: 200, type: WebhookResponseDto })
  @ApiBadRequestResponse({ description: 'Malformed request, invalid parameters or unknown intent' })
  async handle(@Body() dto: WebhookRequestDto): Promise<WebhookResponseDto> {
    const startTime = Date.now();
    const intentName = dto.queryResult.intent.displayName;

    const result = await this.intentRouter.execute({
      intent: intentName,
      parameters: dto.queryResult.parameters,
      outputContexts: dto.queryResult.outputContexts,
    });

    if (result.isLeft()) {
      const error = result.value;
      this.metrics.recordIntent(intentName, error.code);
      this.appLogger.logIntentEvent({
        intent: intentName,
        outcome: error.code,
        durationMs: Date.now() - startTime,
        success: false,
        error: error.message,
      });
      throw this.toHttpException(error);
    }

    const fulfillment = result.value;
    this.metrics.recordIntent(fulfillment.intent, fulfillment.outcome);
    this.appLogger.logIntentEvent({
      intent: fulfillment.intent,
      outcome: fulfillment.outcome,
      durationMs: Date.now() - startTime,
      success: true,
    });

    if (fulfillment.outcome === 'order_placed' && fulfillment.placedOrderId !== undefined) {
      this.metrics.recordOrder('placed');
      this.appLogger.logOrderEvent({
        orderId: String(fulfillment.placedOrderId),
        event: 'placed',
      });
    } else if (fulfillment.outcome === 'order_failed') {
      this.metrics.recordOrder('failed');
    }
    this.metrics.setActiveSessions(await this.sessionStore.size());

    return { fulfillmentText: fulfillment.fulfillmentText };
  }

  private toHttpException(error: IntentRoutingError): HttpException {
    if (error.statusCode >= 500) {
      this.logger.error(`Webhook failed: ${error.message}`);
      return new InternalServerErrorException('An internal error occurred');
    }
    return new HttpException(
      { statusCode: error.statusCode, code: error.code, message: error.message },
      error.statusCode,
    );
  }
}
