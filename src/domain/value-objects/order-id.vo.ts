import { InvalidValueException } from '../exceptions';

/**
 * Value Object representing a placed order's identifier.
 * Ids are positive integers handed out by the persistence layer,
 * never generated by the domain itself.
 */
export class OrderId {
  private constructor(public readonly value: number) {
    this.validate();
  }

  static fromNumber(id: number): OrderId {
    return new OrderId(id);
  }

  // Accepts "42" but rejects "42.5", "abc" and "".
  static fromString(id: string): OrderId {
    const trimmed = id.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw new InvalidValueException('OrderId', `"${id}" is not an integer`);
    }
    return new OrderId(Number(trimmed));
  }

  private validate(): void {
    if (!Number.isSafeInteger(this.value) || this.value < 1) {
      throw new InvalidValueException('OrderId', 'must be a positive integer');
    }
  }

  equals(other: OrderId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return String(this.value);
  }
}
