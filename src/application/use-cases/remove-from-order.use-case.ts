import { Inject, Injectable } from '@nestjs/common';
import { Either, FULFILLMENT_MESSAGES, left, right } from '@application/common';
import {
  fulfillment,
  FulfillmentDto,
  RemoveFromOrderInputDto,
  toOrderSnapshot,
} from '@application/dtos';
import { ApplicationError, toApplicationError } from '@application/errors';
import { IRemoveFromOrderPort } from '@application/ports/inbound';
import { ISessionStorePort, SESSION_STORE } from '@application/ports/outbound';
import { OrderAggregatorService, RemovalOutcome } from '@domain/services';
import { SessionId } from '@domain/value-objects';

/**
 * RemoveFromOrderUseCase drops whole items from a session's order.
 *
 * The reply lists what was removed and what the order did not contain,
 * followed by what is left. An order emptied this way stays in the session.
 */
@Injectable()
export class RemoveFromOrderUseCase implements IRemoveFromOrderPort {
  private readonly aggregator = new OrderAggregatorService();

  constructor(
    @Inject(SESSION_STORE)
    private readonly sessionStore: ISessionStorePort,
  ) {}

  async execute(
    input: RemoveFromOrderInputDto,
  ): Promise<Either<ApplicationError, FulfillmentDto>> {
    try {
      const sessionId = SessionId.fromString(input.sessionId);

      const outcome = await this.sessionStore.runExclusive(sessionId, async () => {
        const existing = await this.sessionStore.get(sessionId);
        if (!existing) {
          return null;
        }
        const removal = this.aggregator.remove(existing, input.items);
        await this.sessionStore.put(sessionId, removal.order);
        return removal;
      });

      if (!outcome) {
        return right(fulfillment(FULFILLMENT_MESSAGES.removeOrderNotFound, 'order_not_found'));
      }

      return right(
        fulfillment(this.describe(outcome), 'items_removed', {
          currentOrder: toOrderSnapshot(outcome.order),
        }),
      );
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  private describe({ order, removed, notFound }: RemovalOutcome): string {
    const clauses: string[] = [];

    if (removed.length > 0) {
      clauses.push(FULFILLMENT_MESSAGES.removedItems(removed));
    }
    if (notFound.length > 0) {
      clauses.push(FULFILLMENT_MESSAGES.itemsNotInOrder(notFound));
    }

    clauses.push(
      order.isEmpty()
        ? FULFILLMENT_MESSAGES.orderIsEmpty
        : FULFILLMENT_MESSAGES.remainingItems(order.toSummary()),
    );

    return clauses.join(' ');
  }
}
