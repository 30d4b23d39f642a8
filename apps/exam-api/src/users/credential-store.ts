import type { User } from './user.entity';

/** Injection token for the Credential Store implementation */
export const CREDENTIAL_STORE = Symbol('CREDENTIAL_STORE');

/**
 * Read access to stored users. Only the Authenticator and result enrichment
 * consult it; nothing in this service writes users after provisioning.
 */
export interface CredentialStore {
  /** @param normalizedEmail - already passed through normalizeEmail */
  findByEmail(normalizedEmail: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
}
