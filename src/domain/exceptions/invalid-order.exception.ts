import { DomainException } from './domain.exception';

/**
 * Thrown when an in-progress or placed order breaks one of its rules,
 * e.g. an item paired with a quantity that is not a positive whole number.
 */
export class InvalidOrderException extends DomainException {
  constructor(message: string) {
    super(message, 'INVALID_ORDER');
  }
}
