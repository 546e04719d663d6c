export { DomainException } from './domain.exception';
export { InvalidOrderException } from './invalid-order.exception';
export { InvalidValueException } from './invalid-value.exception';
