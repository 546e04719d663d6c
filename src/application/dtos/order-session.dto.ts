/**
 * Inputs for the session-scoped order use cases.
 * Parameters arrive already validated by the intent router.
 */

export interface AddToOrderInputDto {
  /** Session the order belongs to */
  readonly sessionId: string;

  /** Food items, positionally paired with `quantities` */
  readonly items: readonly string[];

  readonly quantities: readonly number[];
}

export interface RemoveFromOrderInputDto {
  readonly sessionId: string;

  /** Items to drop entirely, whatever their quantity */
  readonly items: readonly string[];
}

export interface OrderSessionInputDto {
  readonly sessionId: string;
}

export interface TrackOrderInputDto {
  readonly orderId: number;
}
