import { OrderStatus } from '../order-status.vo';
import { InvalidValueException } from '../../exceptions';

describe('OrderStatus', () => {
  it('should start orders in progress', () => {
    const status = OrderStatus.inProgress();

    expect(status.toString()).toBe('in progress');
    expect(status.isInProgress()).toBe(true);
    expect(status.isDelivered()).toBe(false);
  });

  it('should normalize case and surrounding spaces', () => {
    expect(OrderStatus.fromString('  Delivered ').equals(OrderStatus.delivered())).toBe(true);
  });

  it('should keep statuses set by other systems', () => {
    const status = OrderStatus.fromString('Preparing');

    expect(status.toString()).toBe('preparing');
    expect(status.isKnown()).toBe(false);
    expect(OrderStatus.inTransit().isKnown()).toBe(true);
  });

  it('should reject a blank status', () => {
    expect(() => OrderStatus.fromString('   ')).toThrow(InvalidValueException);
  });
});
