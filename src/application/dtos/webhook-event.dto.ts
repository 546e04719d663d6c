import { FulfillmentDto } from './fulfillment.dto';

export type IntentKind = 'add' | 'remove' | 'complete' | 'track' | 'cancel';

export interface WebhookContextDto {
  readonly name: string;
}

/**
 * Transport-free view of one inbound agent event.
 */
export interface WebhookEventDto {
  /** Intent display name, matched exactly */
  readonly intent: string;

  readonly parameters: Readonly<Record<string, unknown>>;

  /** The session id is read from the first context's name */
  readonly outputContexts: readonly WebhookContextDto[];
}

export interface RoutedFulfillmentDto extends FulfillmentDto {
  readonly intent: IntentKind;
}
