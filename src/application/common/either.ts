/**
 * Result type returned by every use case.
 *
 * A `Left` carries the failure (a TutoringError), a `Right` the output.
 * Use cases never throw past their boundary: callers narrow with
 * `isLeft()`/`isRight()` before touching `value`.
 *
 * @example
 * ```typescript
 * const result = await startConversation.execute({ userId: 'usr_123' });
 * if (result.isLeft()) {
 *   return toHttpException(result.value);
 * }
 * return result.value.conversationId;
 * ```
 */
export class Left<L> {
  readonly tag = 'left';

  constructor(public readonly value: L) {}

  isLeft(): this is Left<L> {
    return true;
  }

  isRight(): this is Right<never> {
    return false;
  }
}

export class Right<R> {
  readonly tag = 'right';

  constructor(public readonly value: R) {}

  isLeft(): this is Left<never> {
    return false;
  }

  isRight(): this is Right<R> {
    return true;
  }
}

export type Either<L, R> = Left<L> | Right<R>;

export const left = <L, R = never>(value: L): Either<L, R> => new Left(value);
export const right = <L = never, R = unknown>(value: R): Either<L, R> => new Right(value);

// Collapses a result into one value
export const fold = <L, R, T>(
  result: Either<L, R>,
  onLeft: (error: L) => T,
  onRight: (value: R) => T,
): T => (result.isLeft() ? onLeft(result.value) : onRight(result.value));

// Runs an async operation, turning a rejection into a Left
export const tryCatchAsync = async <L, R>(
  fn: () => Promise<R>,
  onError: (error: unknown) => L,
): Promise<Either<L, R>> => {
  try {
    return right(await fn());
  } catch (error: unknown) {
    return left(onError(error));
  }
};
