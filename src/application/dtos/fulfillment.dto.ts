import { InProgressOrder } from '@domain/entities';

/**
 * What happened while handling an intent. Used for logs and metrics;
 * the agent itself only ever sees the fulfillment text.
 */
export type FulfillmentOutcome =
  | 'items_added'
  | 'clarification_requested'
  | 'items_removed'
  | 'order_not_found'
  | 'order_empty'
  | 'order_placed'
  | 'order_failed'
  | 'status_found'
  | 'status_not_found'
  | 'order_cancelled';

export interface OrderItemSnapshotDto {
  readonly itemName: string;
  readonly quantity: number;
}

/**
 * Output of every intent handler.
 */
export interface FulfillmentDto {
  /** Human-readable answer returned to the agent */
  readonly fulfillmentText: string;

  readonly outcome: FulfillmentOutcome;

  /** Session order after the operation, when one still exists */
  readonly currentOrder?: readonly OrderItemSnapshotDto[];

  /** Id allocated when an order was placed */
  readonly placedOrderId?: number;
}

export function toOrderSnapshot(order: InProgressOrder): OrderItemSnapshotDto[] {
  return order.toEntries().map(([itemName, quantity]) => ({ itemName, quantity }));
}

export function fulfillment(
  fulfillmentText: string,
  outcome: FulfillmentOutcome,
  extras: Pick<FulfillmentDto, 'currentOrder' | 'placedOrderId'> = {},
): FulfillmentDto {
  return { fulfillmentText, outcome, ...extras };
}
