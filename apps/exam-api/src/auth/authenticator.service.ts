import { Inject, Injectable } from '@nestjs/common';
import { InvalidCredentialsException } from '../common/errors/domain.exception';
import { JsonLogger } from '../logging/json-logger.service';
import { CREDENTIAL_STORE, type CredentialStore } from '../users/credential-store';
import { normalizeEmail, toPublicUser, type PublicUser } from '../users/user.entity';
import type { IssuedToken } from './interfaces/session-claims';
import { PasswordHasher } from './password-hasher.service';
import { TokenService } from './token.service';

export interface AuthenticationResult extends IssuedToken {
  user: PublicUser;
}

/**
 * Authenticator - verifies email/password against the Credential Store and
 * hands successful identities to the TokenService. Records nothing.
 */
@Injectable()
export class AuthenticatorService {
  constructor(
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
    private readonly logger: JsonLogger
  ) {}

  /**
   * @throws InvalidCredentialsException for an unknown email and for a wrong
   * password alike
   */
  async authenticate(email: string, password: string): Promise<AuthenticationResult> {
    const user = await this.credentials.findByEmail(normalizeEmail(email));

    if (!user) {
      await this.hasher.burn(password);
      this.logger.warn('Login rejected', { reason: 'invalid_credentials' });
      throw new InvalidCredentialsException();
    }

    if (!(await this.hasher.verify(password, user.passwordHash))) {
      this.logger.warn('Login rejected', { reason: 'invalid_credentials' });
      throw new InvalidCredentialsException();
    }

    const issued = await this.tokens.issue(user.id, user.role);
    this.logger.log('Login succeeded', { userId: user.id, role: user.role });
    return { ...issued, user: toPublicUser(user) };
  }
}
