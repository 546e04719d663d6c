import { InvalidOrderException } from '../exceptions';
import { Money, OrderId, OrderLine, OrderStatus } from '../value-objects';

/**
 * Entity representing a confirmed, persisted order.
 * Read-only from this service's point of view: it is rebuilt from storage
 * and its status is moved forward by other systems.
 */
export class PlacedOrder {
  private constructor(
    public readonly id: OrderId,
    public readonly status: OrderStatus,
    private readonly _lines: OrderLine[],
  ) {}

  // Factory method: reconstitute from persistence
  static reconstitute(props: { id: OrderId; status: OrderStatus; lines: OrderLine[] }): PlacedOrder {
    const currencies = new Set(props.lines.map((line) => line.unitPrice.currency));
    if (currencies.size > 1) {
      throw new InvalidOrderException(
        `Order ${props.id.toString()} mixes currencies: ${[...currencies].join(', ')}`,
      );
    }
    return new PlacedOrder(props.id, props.status, [...props.lines]);
  }

  get lines(): readonly OrderLine[] {
    return [...this._lines];
  }

  get totalPrice(): Money {
    return Money.sum(this._lines.map((line) => line.totalPrice));
  }

  get totalQuantity(): number {
    return this._lines.reduce((total, line) => total + line.quantity, 0);
  }

  equals(other: PlacedOrder): boolean {
    return this.id.equals(other.id);
  }

  toSummary(): string {
    const lines = this._lines.map((line) => line.toSummary()).join(', ');
    return `Order #${this.id.toString()} (${this.status.toString()}): ${lines}`;
  }
}
