import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import { FulfillmentDto, TrackOrderInputDto } from '@application/dtos';

export interface ITrackOrderPort {
  /**
   * Reports the status of a placed order. Needs no session.
   */
  execute(input: TrackOrderInputDto): Promise<Either<ApplicationError, FulfillmentDto>>;
}
