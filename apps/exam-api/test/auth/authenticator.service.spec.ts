import { InvalidCredentialsException } from '../../src/common/errors/domain.exception';
import { AuthenticatorService } from '../../src/auth/authenticator.service';
import { Role } from '../../src/auth/enums/role.enum';
import { PasswordHasher } from '../../src/auth/password-hasher.service';
import { TokenService } from '../../src/auth/token.service';
import { InMemoryCredentialStore } from '../../src/users/in-memory-credential.store';
import { FakeClock, silentLogger, testConfig } from '../support/fixtures';

const T0 = new Date('2026-03-01T08:00:00.000Z');

describe('AuthenticatorService', () => {
  const config = testConfig();
  const hasher = new PasswordHasher(config);
  let store: InMemoryCredentialStore;
  let tokens: TokenService;
  let logger: ReturnType<typeof silentLogger>;
  let authenticator: AuthenticatorService;

  beforeAll(async () => {
    store = new InMemoryCredentialStore();
    store.add({
      id: 'user-1',
      email: 'Alice@Example.test',
      passwordHash: await hasher.hash('test-password'),
      role: Role.USER,
      createdAt: T0,
      updatedAt: T0
    });
  });

  beforeEach(() => {
    tokens = new TokenService(config, new FakeClock(T0));
    logger = silentLogger();
    authenticator = new AuthenticatorService(store, hasher, tokens, logger);
  });

  it('issues a token for the stored identity', async () => {
    const result = await authenticator.authenticate('alice@example.test', 'test-password');

    expect(result.user).toEqual({ id: 'user-1', email: 'alice@example.test', role: Role.USER });
    expect(result.expiresAt).toEqual(new Date(T0.getTime() + 1800 * 1000));
    await expect(tokens.validate(result.token)).resolves.toMatchObject({ userId: 'user-1', role: Role.USER });
    expect(logger.log).toHaveBeenCalledWith('Login succeeded', { userId: 'user-1', role: Role.USER });
  });

  it('trims and lower-cases the email before lookup', async () => {
    const result = await authenticator.authenticate('  ALICE@example.TEST ', 'test-password');
    expect(result.user.id).toBe('user-1');
  });

  it('rejects a wrong password', async () => {
    await expect(authenticator.authenticate('alice@example.test', 'wrong-password')).rejects.toBeInstanceOf(
      InvalidCredentialsException
    );
    expect(logger.warn).toHaveBeenCalledWith('Login rejected', { reason: 'invalid_credentials' });
  });

  it('rejects an unknown email with the same error and still runs a hash comparison', async () => {
    const burn = jest.spyOn(hasher, 'burn');

    const unknown = authenticator.authenticate('nobody@example.test', 'test-password').catch((e: unknown) => e);
    const wrong = authenticator.authenticate('alice@example.test', 'wrong-password').catch((e: unknown) => e);
    const [unknownError, wrongError] = await Promise.all([unknown, wrong]);

    expect(unknownError).toBeInstanceOf(InvalidCredentialsException);
    expect(wrongError).toBeInstanceOf(InvalidCredentialsException);
    expect(unknownError).toEqual(wrongError);
    expect(burn).toHaveBeenCalledTimes(1);
    expect(burn).toHaveBeenCalledWith('test-password');
    burn.mockRestore();
  });

  it('never issues a token on failure', async () => {
    const issue = jest.spyOn(tokens, 'issue');
    await expect(authenticator.authenticate('nobody@example.test', 'x')).rejects.toBeInstanceOf(
      InvalidCredentialsException
    );
    expect(issue).not.toHaveBeenCalled();
  });
});
