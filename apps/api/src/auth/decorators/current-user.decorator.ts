import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticationFields, Principal } from '../interfaces';

/**
 * Parameter decorator that extracts the authenticated principal from the request.
 *
 * Requires JwtAuthGuard to be applied, otherwise request.user is undefined.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Principal => {
    const request = ctx.switchToHttp().getRequest<AuthenticationFields>();
    return request.user;
  },
);
