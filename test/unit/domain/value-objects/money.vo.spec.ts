import { Money } from '@domain/value-objects';
import { InvalidValueException } from '@domain/exceptions';

describe('Money', () => {
  describe('creation', () => {
    it('should create money from cents', () => {
      const money = Money.fromCents(550);

      expect(money.cents).toBe(550);
      expect(money.amount).toBe(5.5);
      expect(money.currency).toBe('USD');
    });

    it('should create money from a major-unit amount', () => {
      const money = Money.fromAmount(12.5, 'INR');

      expect(money.cents).toBe(1250);
      expect(money.currency).toBe('INR');
    });

    it('should create zero money in the requested currency', () => {
      const money = Money.zero('INR');

      expect(money.cents).toBe(0);
      expect(money.currency).toBe('INR');
    });

    it('should round fractional cents', () => {
      expect(Money.fromCents(99.6).cents).toBe(100);
    });

    it('should throw error for negative amount', () => {
      expect(() => Money.fromCents(-100)).toThrow(InvalidValueException);
    });

    it('should throw error for invalid currency', () => {
      expect(() => Money.fromCents(100, 'DOLLARS')).toThrow(InvalidValueException);
    });
  });

  describe('arithmetic operations', () => {
    it('should add two money values', () => {
      const result = Money.fromCents(800).add(Money.fromCents(750));

      expect(result.cents).toBe(1550);
    });

    it('should price a quantity', () => {
      const result = Money.fromCents(800).times(3);

      expect(result.cents).toBe(2400);
    });

    it('should reject a fractional quantity', () => {
      expect(() => Money.fromCents(800).times(1.5)).toThrow('cannot price 1.5 units');
    });

    it('should sum amounts in their currency', () => {
      const total = Money.sum([Money.fromCents(250, 'INR'), Money.fromCents(300, 'INR')]);

      expect(total.equals(Money.fromCents(550, 'INR'))).toBe(true);
    });

    it('should sum an empty list to zero', () => {
      expect(Money.sum([]).equals(Money.zero())).toBe(true);
      expect(Money.sum([], 'INR').currency).toBe('INR');
    });

    it('should throw error when adding different currencies', () => {
      const usd = Money.fromCents(100, 'USD');
      const inr = Money.fromCents(100, 'INR');

      expect(() => usd.add(inr)).toThrow('cannot operate on different currencies: USD vs INR');
    });

    it('should not modify original when adding', () => {
      const original = Money.fromCents(500);

      original.add(Money.fromCents(300));

      expect(original.cents).toBe(500);
    });
  });

  describe('comparison', () => {
    it('should return true for equal money values', () => {
      expect(Money.fromCents(500).equals(Money.fromAmount(5))).toBe(true);
    });

    it('should return false for the same amount in another currency', () => {
      expect(Money.fromCents(500, 'USD').equals(Money.fromCents(500, 'INR'))).toBe(false);
    });
  });

  describe('formatting', () => {
    it('should format USD with a dollar sign', () => {
      expect(Money.fromCents(1600).format()).toBe('$16.00');
    });

    it('should prefix other currencies with their code', () => {
      expect(Money.fromCents(550, 'INR').format()).toBe('INR 5.50');
    });
  });
});
