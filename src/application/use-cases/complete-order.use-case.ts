import { Inject, Injectable, Logger } from '@nestjs/common';
import { Either, FULFILLMENT_MESSAGES, left, right } from '@application/common';
import { fulfillment, FulfillmentDto, OrderSessionInputDto } from '@application/dtos';
import { ApplicationError, toApplicationError } from '@application/errors';
import { ICompleteOrderPort } from '@application/ports/inbound';
import {
  IOrderRepositoryPort,
  ISessionStorePort,
  ORDER_REPOSITORY,
  SESSION_STORE,
} from '@application/ports/outbound';
import { InProgressOrder } from '@domain/entities';
import { OrderId, OrderStatus, SessionId } from '@domain/value-objects';

/**
 * CompleteOrderUseCase turns a session's in-progress order into a placed order.
 *
 * Persistence steps, in order:
 * 1. allocate an order id
 * 2. write one line per item, stopping at the first failed write
 * 3. record the tracking status as "in progress"
 *
 * If any step fails the lines already written are deleted and the user is
 * told to order again. The session's order is removed in every case.
 */
@Injectable()
export class CompleteOrderUseCase implements ICompleteOrderPort {
  private readonly logger = new Logger(CompleteOrderUseCase.name);

  constructor(
    @Inject(SESSION_STORE)
    private readonly sessionStore: ISessionStorePort,
    @Inject(ORDER_REPOSITORY)
    private readonly orderRepository: IOrderRepositoryPort,
  ) {}

  async execute(input: OrderSessionInputDto): Promise<Either<ApplicationError, FulfillmentDto>> {
    try {
      const sessionId = SessionId.fromString(input.sessionId);

      const result = await this.sessionStore.runExclusive(sessionId, async () => {
        try {
          return await this.complete(sessionId);
        } finally {
          await this.sessionStore.delete(sessionId);
        }
      });

      return right(result);
    } catch (error) {
      return left(toApplicationError(error));
    }
  }

  private async complete(sessionId: SessionId): Promise<FulfillmentDto> {
    const order = await this.sessionStore.get(sessionId);

    if (!order) {
      return fulfillment(FULFILLMENT_MESSAGES.completeOrderNotFound, 'order_not_found');
    }
    if (order.isEmpty()) {
      return fulfillment(FULFILLMENT_MESSAGES.nothingToPlace, 'order_empty');
    }

    const orderId = await this.saveOrder(order);
    if (!orderId) {
      return fulfillment(FULFILLMENT_MESSAGES.placementFailed, 'order_failed');
    }

    const total = await this.orderRepository.getOrderTotal(orderId);
    this.logger.log(
      `Order ${orderId.toString()} placed for session ${sessionId.value}: ${order.toSummary()} (${total.format()})`,
    );

    return fulfillment(
      FULFILLMENT_MESSAGES.orderPlaced(orderId.toString(), total.format()),
      'order_placed',
      { placedOrderId: orderId.value },
    );
  }

  /**
   * @returns The new order's id, or null when the order could not be stored
   */
  private async saveOrder(order: InProgressOrder): Promise<OrderId | null> {
    let orderId: OrderId | null = null;

    try {
      orderId = await this.orderRepository.nextOrderId();

      for (const [itemName, quantity] of order.toEntries()) {
        const written = await this.orderRepository.insertLineItem(itemName, quantity, orderId);
        if (!written) {
          this.logger.warn(
            `Could not write "${itemName}" x${quantity} for order ${orderId.toString()}`,
          );
          await this.discard(orderId);
          return null;
        }
      }

      await this.orderRepository.setOrderStatus(orderId, OrderStatus.inProgress());
      return orderId;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to save order: ${message}`);
      if (orderId) {
        await this.discard(orderId);
      }
      return null;
    }
  }

  // Best effort: a failure here leaves orphan lines without a tracking record.
  private async discard(orderId: OrderId): Promise<void> {
    try {
      const removed = await this.orderRepository.deleteLineItems(orderId);
      this.logger.debug(`Discarded ${removed} line(s) of order ${orderId.toString()}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Failed to discard lines of order ${orderId.toString()}: ${message}`);
    }
  }
}
