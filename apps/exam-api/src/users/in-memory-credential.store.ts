import { Injectable } from '@nestjs/common';
import type { CredentialStore } from './credential-store';
import { normalizeEmail, type User } from './user.entity';

/**
 * Process-owned Credential Store used with DATA_STORE=memory.
 * Users are added at startup (seed file) or by tests.
 */
@Injectable()
export class InMemoryCredentialStore implements CredentialStore {
  private readonly byId = new Map<string, User>();
  private readonly idByEmail = new Map<string, string>();

  add(user: User): void {
    const email = normalizeEmail(user.email);
    if (this.idByEmail.has(email)) {
      throw new Error(`Duplicate user email: ${email}`);
    }
    this.byId.set(user.id, { ...user, email });
    this.idByEmail.set(email, user.id);
  }

  async findByEmail(normalizedEmail: string): Promise<User | null> {
    const id = this.idByEmail.get(normalizedEmail);
    return id === undefined ? null : (this.byId.get(id) ?? null);
  }

  async findById(id: string): Promise<User | null> {
    return this.byId.get(id) ?? null;
  }
}
