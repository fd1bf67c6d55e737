import { Either, fold, left, right, tryCatchAsync } from '@application/common';
import { TutoringError, UnexpectedError, toTutoringError } from '@application/errors';
import { ValidationException } from '@domain/exceptions';

describe('Either', () => {
  it('should fold both sides', () => {
    const render = (result: Either<string, number>): string =>
      fold(
        result,
        (error) => `error: ${error}`,
        (n) => `value: ${n}`,
      );

    expect(render(left('boom'))).toBe('error: boom');
    expect(render(right(7))).toBe('value: 7');
  });

  it('should build each side with the factories', () => {
    expect(left('boom').isLeft()).toBe(true);
    expect(right(1).isRight()).toBe(true);
  });

  describe('tryCatchAsync', () => {
    it('should wrap a resolved value in a Right', async () => {
      const result = await tryCatchAsync(async () => 'ok', toTutoringError);

      expect(result.isRight() && result.value).toBe('ok');
    });

    it('should keep domain exceptions as they are', async () => {
      const exception = new ValidationException('Language', 'bad code');

      const result = await tryCatchAsync<TutoringError, never>(async () => {
        throw exception;
      }, toTutoringError);

      expect(result.isLeft() && result.value).toBe(exception);
    });

    it('should turn unknown failures into UnexpectedError', async () => {
      const result = await tryCatchAsync<TutoringError, never>(async () => {
        throw new TypeError('undefined is not a function');
      }, toTutoringError);

      expect(result.isLeft()).toBe(true);
      if (result.isLeft()) {
        expect(result.value).toBeInstanceOf(UnexpectedError);
        expect(result.value.message).toBe(
          'An unexpected error occurred: undefined is not a function',
        );
      }
    });
  });
});
