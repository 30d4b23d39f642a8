import type { Role } from '../enums/role.enum';
import type { SessionClaims } from './session-claims';

/**
 * AuthenticatedUser - attached to the Express request by JwtAuthGuard
 * once the bearer token has been validated
 */
export interface AuthenticatedUser {
  userId: string;
  role: Role;
  /** Validated token claims, including its expiry */
  claims: SessionClaims;
}
