import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, FULFILLMENT_MESSAGES, left, right } from '@application/common';
import { AddToOrderInputDto, fulfillment, FulfillmentDto, toOrderSnapshot } from '@application/dtos';
import { ApplicationError, toApplicationError } from '@application/errors';
import { IAddToOrderPort } from '@application/ports/inbound';
import { ISessionStorePort, SESSION_STORE } from '@application/ports/outbound';
import { OrderAggregatorService } from '@domain/services';
import { SessionId } from '@domain/value-objects';

/**
 * AddToOrderUseCase merges food items into a session's in-progress order.
 *
 * Items and quantities are paired by position. When they cannot be paired
 * (different lengths, or nothing recognised at all) the agent is asked to
 * repeat the request and the session is left untouched.
 */
@Injectable()
export class AddToOrderUseCase implements IAddToOrderPort {
  private readonly logger = new Logger(AddToOrderUseCase.name);
  private readonly aggregator = new OrderAggregatorService();

  constructor(
    @Inject(SESSION_STORE)
    private readonly sessionStore: ISessionStorePort,
  ) {}

  async execute(input: AddToOrderInputDto): Promise<Either<ApplicationError, FulfillmentDto>> {
    try {
      const candidate = this.aggregator.pair(input.items, input.quantities);
      if (!candidate || candidate.isEmpty()) {
        this.logger.debug(
          `Unpaired add for session ${input.sessionId}: ${input.items.length} items, ${input.quantities.length} quantities`,
        );
        return right(
          fulfillment(FULFILLMENT_MESSAGES.clarifyItemsAndQuantities, 'clarification_requested'),
        );
      }

      const sessionId = SessionId.fromString(input.sessionId);

      const order = await this.sessionStore.runExclusive(sessionId, async () => {
        const existing = await this.sessionStore.get(sessionId);
        const merged = this.aggregator.merge(existing, candidate);
        await this.sessionStore.put(sessionId, merged);
        return merged;
      });

      return right(
        fulfillment(FULFILLMENT_MESSAGES.orderSoFar(order.toSummary()), 'items_added', {
          currentOrder: toOrderSnapshot(order),
        }),
      );
    } catch (error) {
      return left(toApplicationError(error));
    }
  }
}
