import type { Role } from '../enums/role.enum';

/**
 * Identity carried by a validated session token
 */
export interface SessionClaims {
  /** `sub` claim */
  userId: string;
  role: Role;
  issuedAt: Date;
  expiresAt: Date;
}

/**
 * Result of minting a token: the compact JWT plus its lifetime
 */
export interface IssuedToken {
  token: string;
  issuedAt: Date;
  expiresAt: Date;
}
