import type { Role } from '../auth/enums/role.enum';

/**
 * Stored user identity as seen by the Credential Store.
 * Provisioned out-of-band; the role never changes inside this service.
 */
export interface User {
  id: string;
  /** Lower-cased, trimmed; unique */
  email: string;
  /** bcrypt hash (salt embedded) */
  passwordHash: string;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
}

/** The part of a user that is safe to return to clients */
export type PublicUser = Pick<User, 'id' | 'email' | 'role'>;

export function toPublicUser(user: User): PublicUser {
  return { id: user.id, email: user.email, role: user.role };
}

/**
 * Canonical form of an email used for lookups and uniqueness
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
