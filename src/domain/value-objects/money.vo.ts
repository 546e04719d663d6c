import { InvalidValueException } from '../exceptions';

/**
 * Value Object for prices and order totals, held as an integer number of
 * cents plus an ISO currency code. Every operation returns a new instance.
 */
export class Money {
  private static readonly DEFAULT_CURRENCY = 'USD';

  private constructor(
    public readonly cents: number,
    public readonly currency: string,
  ) {
    if (!Number.isSafeInteger(cents) || cents < 0) {
      throw new InvalidValueException('Money', 'amount must be a non-negative whole number of cents');
    }
    if (!/^[A-Z]{3}$/.test(currency)) {
      throw new InvalidValueException('Money', 'currency must be a 3-letter code');
    }
  }

  static fromCents(cents: number, currency = Money.DEFAULT_CURRENCY): Money {
    return new Money(Math.round(cents), currency);
  }

  static fromAmount(amount: number, currency = Money.DEFAULT_CURRENCY): Money {
    return new Money(Math.round(amount * 100), currency);
  }

  static zero(currency = Money.DEFAULT_CURRENCY): Money {
    return new Money(0, currency);
  }

  /**
   * Adds up amounts of one currency. An empty list sums to zero in
   * `currency`, or in the default currency when none is given.
   */
  static sum(amounts: readonly Money[], currency?: string): Money {
    const start = Money.zero(currency ?? amounts[0]?.currency);
    return amounts.reduce((total, amount) => total.add(amount), start);
  }

  // Major units (dollars, rupees...)
  get amount(): number {
    return this.cents / 100;
  }

  isZero(): boolean {
    return this.cents === 0;
  }

  add(other: Money): Money {
    if (this.currency !== other.currency) {
      throw new InvalidValueException(
        'Money',
        `cannot operate on different currencies: ${this.currency} vs ${other.currency}`,
      );
    }
    return new Money(this.cents + other.cents, this.currency);
  }

  // Price of `quantity` units
  times(quantity: number): Money {
    if (!Number.isInteger(quantity) || quantity < 0) {
      throw new InvalidValueException('Money', `cannot price ${quantity} units`);
    }
    return new Money(this.cents * quantity, this.currency);
  }

  equals(other: Money): boolean {
    return this.cents === other.cents && this.currency === other.currency;
  }

  // "$16.00" for dollars, "INR 5.50" otherwise
  format(): string {
    const value = this.amount.toFixed(2);
    return this.currency === Money.DEFAULT_CURRENCY ? `$${value}` : `${this.currency} ${value}`;
  }

  toString(): string {
    return this.format();
  }
}
