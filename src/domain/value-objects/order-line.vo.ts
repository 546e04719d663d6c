import { InvalidValueException } from '../exceptions';
import { Money } from './money.vo';

/**
 * Value Object representing one persisted line of a placed order:
 * a food item, how many of it, and the catalog price at placement time.
 */
export class OrderLine {
  private constructor(
    public readonly itemName: string,
    public readonly quantity: number,
    public readonly unitPrice: Money,
  ) {
    this.validate();
  }

  static create(props: { itemName: string; quantity: number; unitPrice: Money }): OrderLine {
    return new OrderLine(props.itemName, props.quantity, props.unitPrice);
  }

  private validate(): void {
    if (!this.itemName || this.itemName.trim().length === 0) {
      throw new InvalidValueException('OrderLine', 'item name cannot be empty');
    }
    if (!Number.isInteger(this.quantity) || this.quantity < 1) {
      throw new InvalidValueException('OrderLine', 'quantity must be a positive whole number');
    }
  }

  get totalPrice(): Money {
    return this.unitPrice.times(this.quantity);
  }

  toSummary(): string {
    return `${this.quantity} ${this.itemName}`;
  }
}
