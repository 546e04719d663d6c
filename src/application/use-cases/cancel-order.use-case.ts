import { Inject, Injectable } from '@nestjs/common';
import { Either, FULFILLMENT_MESSAGES, left, right } from '@application/common';
import { fulfillment, FulfillmentDto, OrderSessionInputDto } from '@application/dtos';
import { ApplicationError, toApplicationError } from '@application/errors';
import { ICancelOrderPort } from '@application/ports/inbound';
import { ISessionStorePort, SESSION_STORE } from '@application/ports/outbound';
import { SessionId } from '@domain/value-objects';

/**
 * Discards the session's in-progress order. Nothing is persisted.
 */
@Injectable()
export class CancelOrderUseCase implements ICancelOrderPort {
  constructor(
    @Inject(SESSION_STORE)
    private readonly sessionStore: ISessionStorePort,
  ) {}

  async execute(input: OrderSessionInputDto): Promise<Either<ApplicationError, FulfillmentDto>> {
    try {
      const sessionId = SessionId.fromString(input.sessionId);
      const cancelled = await this.sessionStore.runExclusive(sessionId, () =>
        this.sessionStore.delete(sessionId),
      );

      return right(
        cancelled
          ? fulfillment(FULFILLMENT_MESSAGES.orderCancelled, 'order_cancelled')
          : fulfillment(FULFILLMENT_MESSAGES.nothingToCancel, 'order_not_found'),
      );
    } catch (error) {
      return left(toApplicationError(error));
    }
  }
}
