import { Injectable, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcryptjs';

/**
 * bcrypt hashing with a per-hash random salt (embedded in the hash string)
 */
@Injectable()
export class PasswordHasher implements OnModuleInit {
  private readonly rounds: number;
  private dummyHash?: Promise<string>;

  constructor(private readonly config: ConfigService) {
    this.rounds = this.config.get<number>('PASSWORD_HASH_ROUNDS') ?? 12;
  }

  /** Prepares the comparison hash for unknown emails before the first login */
  async onModuleInit(): Promise<void> {
    await this.comparisonHash();
  }

  hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.rounds);
  }

  verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }

  /**
   * Runs one comparison at full cost against a fixed hash and discards the
   * result. Used for unknown emails so they take as long as a wrong password.
   */
  async burn(plain: string): Promise<void> {
    await bcrypt.compare(plain, await this.comparisonHash());
  }

  private comparisonHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = this.hash('no-such-user');
    }
    return this.dummyHash;
  }
}
