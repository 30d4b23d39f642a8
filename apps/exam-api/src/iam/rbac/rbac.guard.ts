// Import NestJS guard contracts
import { CanActivate, ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
// Import Reflector to read decorator metadata
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { ForbiddenActionException } from '../../common/errors/domain.exception';
import type { Action } from './permission.types';
import { PermissionService } from './permission.service';
import { REQUIRED_ACTION_KEY } from './require-action.decorator';

/**
 * RbacGuard - asks the Permission Gate whether the authenticated role may
 * perform the route's @RequireAction().
 *
 * Guards run before pipes, so a disallowed role is rejected before the body
 * or query is validated.
 *
 * Usage: @UseGuards(JwtAuthGuard, RbacGuard)
 */
@Injectable()
export class RbacGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly permissions: PermissionService
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();

    // Set by JwtAuthGuard
    const user = request.user;
    if (!user) throw new UnauthorizedException('Unauthorized');

    const action = this.reflector.getAllAndOverride<Action | undefined>(REQUIRED_ACTION_KEY, [
      context.getHandler(),
      context.getClass()
    ]);

    // Fail closed when a route forgot to declare its action
    if (!action) throw new ForbiddenActionException();

    this.permissions.authorize(user.role, action);
    return true;
  }
}
