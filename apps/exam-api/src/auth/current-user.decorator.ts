import { createParamDecorator, UnauthorizedException, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { AuthenticatedUser } from './interfaces/authenticated-user';

/**
 * @CurrentUser() - the identity JwtAuthGuard attached to the request
 */
export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext): AuthenticatedUser => {
  const user = ctx.switchToHttp().getRequest<Request>().user;
  // Only reachable when a route forgot JwtAuthGuard
  if (!user) throw new UnauthorizedException('Unauthorized');
  return user;
});
