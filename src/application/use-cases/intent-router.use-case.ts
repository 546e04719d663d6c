import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, left, right } from '@application/common';
import {
  FulfillmentDto,
  IntentKind,
  RoutedFulfillmentDto,
  WebhookEventDto,
} from '@application/dtos';
import {
  ApplicationError,
  IntentNotFoundError,
  IntentRoutingError,
  SessionNotIdentifiedError,
  toApplicationError,
  UnexpectedError,
  ValidationError,
} from '@application/errors';
import {
  IAddToOrderPort,
  ICancelOrderPort,
  ICompleteOrderPort,
  IIntentRouterPort,
  IRemoveFromOrderPort,
  ITrackOrderPort,
} from '@application/ports/inbound';
import {
  addToOrderParametersSchema,
  parseIntentParameters,
  removeFromOrderParametersSchema,
  trackOrderParametersSchema,
} from '@application/validation';
import { SessionId } from '@domain/value-objects';
import { AddToOrderUseCase } from './add-to-order.use-case';
import { CancelOrderUseCase } from './cancel-order.use-case';
import { CompleteOrderUseCase } from './complete-order.use-case';
import { RemoveFromOrderUseCase } from './remove-from-order.use-case';
import { TrackOrderUseCase } from './track-order.use-case';

/**
 * Intent display names as configured in the agent, mapped to handlers.
 * Names are matched exactly, including their irregular spacing.
 */
export const INTENT_BINDINGS: Readonly<Record<string, IntentKind>> = {
  'order.add- context: ongoing-order': 'add',
  'order.remove- context: ongoing-order': 'remove',
  'order.complete-context: ongoing-order': 'complete',
  'track.order-context: ongoing-tracking': 'track',
  'order.cancel- context: ongoing-order': 'cancel',
};

type HandlerResult = Promise<Either<ApplicationError, FulfillmentDto>>;

// Session routes need the caller's session; global routes do not.
type IntentRoute =
  | {
      scope: 'session';
      handle: (sessionId: SessionId, parameters: unknown) => HandlerResult;
    }
  | {
      scope: 'global';
      handle: (parameters: unknown) => HandlerResult;
    };

/**
 * IntentRouterUseCase is the single entry point for agent webhook events.
 *
 * Flow:
 * 1. Look up the handler for the intent display name
 * 2. Extract the session id from the first output context (session routes)
 * 3. Validate the intent's parameters
 * 4. Delegate to the handler's use case
 */
@Injectable()
export class IntentRouterUseCase implements IIntentRouterPort {
  private readonly logger = new Logger(IntentRouterUseCase.name);
  private readonly routes: ReadonlyMap<IntentKind, IntentRoute>;

  constructor(
    @Inject(AddToOrderUseCase)
    private readonly addToOrder: IAddToOrderPort,
    @Inject(RemoveFromOrderUseCase)
    private readonly removeFromOrder: IRemoveFromOrderPort,
    @Inject(CompleteOrderUseCase)
    private readonly completeOrder: ICompleteOrderPort,
    @Inject(TrackOrderUseCase)
    private readonly trackOrder: ITrackOrderPort,
    @Inject(CancelOrderUseCase)
    private readonly cancelOrder: ICancelOrderPort,
  ) {
    this.routes = new Map<IntentKind, IntentRoute>([
      [
        'add',
        {
          scope: 'session',
          handle: async (sessionId, parameters) => {
            const parsed = parseIntentParameters(addToOrderParametersSchema, parameters);
            if (parsed.isLeft()) {
              return parsed;
            }
            return this.addToOrder.execute({
              sessionId: sessionId.value,
              items: parsed.value['food-item'],
              quantities: parsed.value.number,
            });
          },
        },
      ],
      [
        'remove',
        {
          scope: 'session',
          handle: async (sessionId, parameters) => {
            const parsed = parseIntentParameters(removeFromOrderParametersSchema, parameters);
            if (parsed.isLeft()) {
              return parsed;
            }
            return this.removeFromOrder.execute({
              sessionId: sessionId.value,
              items: parsed.value['food-item'],
            });
          },
        },
      ],
      [
        'complete',
        {
          scope: 'session',
          handle: (sessionId) => this.completeOrder.execute({ sessionId: sessionId.value }),
        },
      ],
      [
        'cancel',
        {
          scope: 'session',
          handle: (sessionId) => this.cancelOrder.execute({ sessionId: sessionId.value }),
        },
      ],
      [
        'track',
        {
          scope: 'global',
          handle: async (parameters) => {
            const parsed = parseIntentParameters(trackOrderParametersSchema, parameters);
            if (parsed.isLeft()) {
              return parsed;
            }
            return this.trackOrder.execute({ orderId: parsed.value.number });
          },
        },
      ],
    ]);
  }

  async execute(
    event: WebhookEventDto,
  ): Promise<Either<IntentRoutingError, RoutedFulfillmentDto>> {
    const intent = INTENT_BINDINGS[event.intent];
    const route = intent ? this.routes.get(intent) : undefined;

    if (!intent || !route) {
      this.logger.warn(`Unknown intent "${event.intent}"`);
      return left(new IntentNotFoundError(event.intent));
    }

    try {
      let result: Either<ApplicationError, FulfillmentDto>;

      if (route.scope === 'session') {
        const sessionId = this.extractSessionId(event);
        if (!sessionId) {
          return left(new SessionNotIdentifiedError());
        }
        result = await route.handle(sessionId, event.parameters);
      } else {
        result = await route.handle(event.parameters);
      }

      if (result.isLeft()) {
        return left(this.narrow(result.value));
      }

      return right({ ...result.value, intent });
    } catch (error) {
      return left(this.narrow(toApplicationError(error)));
    }
  }

  private extractSessionId(event: WebhookEventDto): SessionId | null {
    const [context] = event.outputContexts;
    return context ? SessionId.fromContextName(context.name) : null;
  }

  // Handlers only produce the errors listed in IntentRoutingError; anything else is unexpected.
  private narrow(error: ApplicationError): IntentRoutingError {
    if (
      error instanceof IntentNotFoundError ||
      error instanceof ValidationError ||
      error instanceof UnexpectedError
    ) {
      return error;
    }
    return new UnexpectedError(error.message);
  }
}
