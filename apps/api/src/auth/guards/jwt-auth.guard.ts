import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { AuthenticationGate } from '../gate';
import type { AuthenticationFields } from '../interfaces';
import {
  NotAuthenticatedException,
  TokenRejectedException,
} from '../exceptions';

/**
 * JWT Authentication Guard: protects routes that require a bearer access token.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * @Get('protected')
 * getProtected(@CurrentUser() user: Principal) { ... }
 * ```
 *
 * On success, attaches `user` (Principal) and `auth` (ClaimsSet) to the
 * request. On failure, answers 401 with a `WWW-Authenticate` challenge.
 * A missing header or a non-Bearer scheme is treated as "no credentials":
 * this API has no other authentication scheme to fall back to.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly gate: AuthenticationGate) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const result = await this.gate.authenticate(request.headers.authorization);

    switch (result.status) {
      case 'authenticated': {
        const fields: AuthenticationFields = {
          user: result.principal,
          auth: result.claims,
        };
        Object.assign(request, fields);
        return true;
      }
      case 'not_attempted':
        throw this.challenge(
          http.getResponse<Response>(),
          new NotAuthenticatedException(),
        );
      case 'rejected':
        throw this.challenge(
          http.getResponse<Response>(),
          TokenRejectedException.forGate(result.reason),
        );
    }
  }

  private challenge(response: Response, exception: HttpException): HttpException {
    response.setHeader('WWW-Authenticate', this.gate.challenge());
    return exception;
  }
}
