import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when the username/password pair does not match an active user.
 *
 * HTTP 401 Unauthorized: the same message for unknown users, wrong
 * passwords and deactivated accounts.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Invalid credentials',
    });
  }
}
