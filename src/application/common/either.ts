/**
 * Either<L, R>: a use case result that is either a failure the caller must
 * handle (Left) or a success (Right).
 *
 * Soft ordering problems (nothing to remove, no order to complete) are not
 * failures: they come back as Right with an explanatory fulfillment message.
 *
 * @example
 * ```typescript
 * const result = await router.execute(event);
 * if (result.isLeft()) {
 *   throw toHttpException(result.value);
 * }
 * return { fulfillmentText: result.value.fulfillmentText };
 * ```
 */
export type Either<L, R> = Left<L> | Right<R>;

export class Left<L> {
  readonly kind = 'left';

  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

export class Right<R> {
  readonly kind = 'right';

  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);
