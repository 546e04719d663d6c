import { PlacedOrder } from '@domain/entities';
import { Money, OrderId, OrderStatus } from '@domain/value-objects';

export interface IOrderRepositoryPort {
  /**
   * Allocates the id for the next order.
   * Ids are unique and increase monotonically, also across concurrent callers.
   */
  nextOrderId(): Promise<OrderId>;

  /**
   * Writes one line of an order, priced from the food catalog.
   *
   * @returns false when the line could not be written (unknown item or a
   *   storage failure); the failure is logged, never thrown
   */
  insertLineItem(itemName: string, quantity: number, orderId: OrderId): Promise<boolean>;

  /**
   * Removes every line written for an order.
   * Used to discard a partially written order.
   *
   * @returns Number of lines removed
   */
  deleteLineItems(orderId: OrderId): Promise<number>;

  setOrderStatus(orderId: OrderId, status: OrderStatus): Promise<void>;

  /**
   * Sum of quantity times unit price over the order's lines.
   * An order without lines totals zero.
   */
  getOrderTotal(orderId: OrderId): Promise<Money>;

  /**
   * @returns The tracking status, or null when no order has that id
   */
  getOrderStatus(orderId: OrderId): Promise<OrderStatus | null>;

  /**
   * Loads a placed order with its lines.
   *
   * @returns The order, or null when it has no tracking record
   */
  findById(orderId: OrderId): Promise<PlacedOrder | null>;
}
