import { createParamDecorator, type ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import { TokenMalformedException } from '../common/errors/domain.exception';

/**
 * Extract the raw token from `Authorization: Bearer <token>`
 * @throws TokenMalformedException if the header is missing or not a Bearer credential
 */
export function extractBearerToken(req: Request): string {
  const header = req.header('authorization');
  if (!header) throw new TokenMalformedException();

  const [scheme, value, ...rest] = header.trim().split(/\s+/);
  if (!scheme || !value || rest.length > 0) throw new TokenMalformedException();
  if (scheme.toLowerCase() !== 'bearer') throw new TokenMalformedException();

  return value;
}

/**
 * @BearerToken() - injects the raw bearer token into a handler parameter.
 * For routes that hand the token to a service which validates it itself.
 */
export const BearerToken = createParamDecorator((_data: unknown, ctx: ExecutionContext): string =>
  extractBearerToken(ctx.switchToHttp().getRequest<Request>())
);
