export { ErrorResponseBody, statusFor, toHttpException, unwrapOrThrow } from './http-error.mapper';
