import { HttpException, HttpStatus } from '@nestjs/common';

/** 429 carrying the seconds until the caller's window resets (sent as Retry-After) */
export class RateLimitedException extends HttpException {
  constructor(
    readonly retryAfterSeconds: number,
    message = 'Too many requests',
  ) {
    super(message, HttpStatus.TOO_MANY_REQUESTS);
  }
}
