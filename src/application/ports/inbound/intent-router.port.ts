import { Either } from '@application/common';
import { IntentRoutingError } from '@application/errors';
import { RoutedFulfillmentDto, WebhookEventDto } from '@application/dtos';

export interface IIntentRouterPort {
  /**
   * Dispatches one agent event to its handler by intent display name.
   *
   * @returns Either a routing/validation error or the handler's fulfillment
   */
  execute(event: WebhookEventDto): Promise<Either<IntentRoutingError, RoutedFulfillmentDto>>;
}
