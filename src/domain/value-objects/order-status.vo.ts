import { InvalidValueException } from '../exceptions';

/**
 * Value Object representing the tracking status of a placed order.
 * Every order starts "in progress"; later transitions are made by the
 * kitchen and delivery side, outside this service, which may use statuses
 * beyond the ones named here. Any non-blank status is accepted.
 */
export class OrderStatus {
  private static readonly KNOWN_STATUSES = [
    'in progress',
    'in transit',
    'delivered',
    'cancelled',
  ] as const;

  private constructor(public readonly value: string) {
    this.validate();
  }

  static inProgress(): OrderStatus {
    return new OrderStatus('in progress');
  }

  static inTransit(): OrderStatus {
    return new OrderStatus('in transit');
  }

  static delivered(): OrderStatus {
    return new OrderStatus('delivered');
  }

  static cancelled(): OrderStatus {
    return new OrderStatus('cancelled');
  }

  static fromString(status: string): OrderStatus {
    return new OrderStatus(status.toLowerCase().trim());
  }

  private validate(): void {
    if (!this.value) {
      throw new InvalidValueException('OrderStatus', 'cannot be blank');
    }
  }

  /** Whether this is one of the statuses this service knows by name */
  isKnown(): boolean {
    return OrderStatus.KNOWN_STATUSES.some((status) => status === this.value);
  }

  isInProgress(): boolean {
    return this.value === 'in progress';
  }

  isDelivered(): boolean {
    return this.value === 'delivered';
  }

  equals(other: OrderStatus): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
