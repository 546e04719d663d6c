import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import {
  AddToOrderInputDto,
  FulfillmentDto,
  OrderSessionInputDto,
  RemoveFromOrderInputDto,
} from '@application/dtos';

export interface IAddToOrderPort {
  /**
   * Merges items into the session's order, creating it if needed.
   * A quantity given for an item already in the order replaces the old one.
   *
   * @returns The running order summary, or a request to clarify when the
   *   items and quantities cannot be paired
   */
  execute(input: AddToOrderInputDto): Promise<Either<ApplicationError, FulfillmentDto>>;
}

export interface IRemoveFromOrderPort {
  /**
   * Drops whole items from the session's order.
   * Names not in the order are reported back, not treated as errors.
   */
  execute(input: RemoveFromOrderInputDto): Promise<Either<ApplicationError, FulfillmentDto>>;
}

export interface ICompleteOrderPort {
  /**
   * Persists the session's order and ends the session, whatever the outcome.
   */
  execute(input: OrderSessionInputDto): Promise<Either<ApplicationError, FulfillmentDto>>;
}

export interface ICancelOrderPort {
  /**
   * Discards the session's order without persisting anything.
   */
  execute(input: OrderSessionInputDto): Promise<Either<ApplicationError, FulfillmentDto>>;
}
