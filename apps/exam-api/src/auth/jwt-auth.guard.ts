// Import NestJS guard contracts
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
// Import Express Request type for type safety
import type { Request } from 'express';
import { extractBearerToken } from './bearer-token';
import { TokenService } from './token.service';

/**
 * JwtAuthGuard - validates the bearer session token and attaches the
 * authenticated user to the request.
 * Use with @UseGuards(JwtAuthGuard) on controllers or routes
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly tokens: TokenService) {}

  /**
   * @returns true on success; token failures propagate as their own domain exceptions
   */
  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<Request>();
    const token = extractBearerToken(request);

    const claims = await this.tokens.validate(token);
    request.user = { userId: claims.userId, role: claims.role, claims };
    return true;
  }
}
