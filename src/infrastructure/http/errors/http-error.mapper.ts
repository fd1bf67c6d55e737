import { HttpException, HttpStatus } from '@nestjs/common';
import { Either, fold } from '@application/common';
import { NotFoundError, TutoringError } from '@application/errors';

export interface ErrorResponseBody {
  statusCode: number;
  code: string;
  message: string;
}

const STATUS_BY_CODE: Readonly<Record<string, HttpStatus>> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  INVALID_STATE_TRANSITION: HttpStatus.CONFLICT,
  CONVERSATION_NOT_ACTIVE: HttpStatus.CONFLICT,
  INVALID_REVIEW_OUTCOME: HttpStatus.UNPROCESSABLE_ENTITY,
  CONFLICT: HttpStatus.CONFLICT,
  PROVIDER_ERROR: HttpStatus.BAD_GATEWAY,
  PORT_TIMEOUT: HttpStatus.GATEWAY_TIMEOUT,
  PORT_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
};

export function statusFor(error: TutoringError): HttpStatus {
  if (error instanceof NotFoundError) {
    return HttpStatus.NOT_FOUND;
  }
  return STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
}

/**
 * Translates a use case failure into the HttpException Nest sends back.
 * The body always carries the error code, so clients can branch on it.
 */
export function toHttpException(error: TutoringError): HttpException {
  const statusCode = statusFor(error);
  const body: ErrorResponseBody = {
    statusCode,
    code: error.code,
    // Unexpected errors may carry internals
    message: statusCode === HttpStatus.INTERNAL_SERVER_ERROR ? 'Internal server error' : error.message,
  };
  return new HttpException(body, statusCode, { cause: error });
}

// Returns the success value or throws the mapped HttpException
export function unwrapOrThrow<T>(result: Either<TutoringError, T>): T {
  return fold(
    result,
    (error) => {
      throw toHttpException(error);
    },
    (value) => value,
  );
}
