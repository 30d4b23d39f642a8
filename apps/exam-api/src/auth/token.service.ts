import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { errors, jwtVerify, SignJWT, type JWTPayload } from 'jose';
import { randomUUID } from 'node:crypto';
import {
  TokenExpiredException,
  TokenMalformedException,
  TokenSignatureInvalidException
} from '../common/errors/domain.exception';
import { CLOCK, type Clock } from '../common/time/clock';
import { isRole, type Role } from './enums/role.enum';
import type { IssuedToken, SessionClaims } from './interfaces/session-claims';

const ALGORITHM = 'HS256';

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/**
 * Convert a verified payload into typed claims.
 * jwtVerify has already checked signature, issuer and exp.
 */
function toSessionClaims(payload: JWTPayload): SessionClaims {
  const { sub, iat, exp } = payload;
  const role = payload['role'];
  if (!isNonEmptyString(sub) || !isRole(role) || typeof iat !== 'number' || typeof exp !== 'number') {
    throw new TokenMalformedException();
  }
  return {
    userId: sub,
    role,
    issuedAt: new Date(iat * 1000),
    expiresAt: new Date(exp * 1000)
  };
}

/**
 * TokenService - issues and checks stateless HS256 session tokens.
 *
 * Validation depends only on the secret, the token text and the clock: no
 * store is consulted, so any instance holding the secret can validate.
 */
@Injectable()
export class TokenService {
  private readonly secret: Uint8Array;
  private readonly issuer: string;
  private readonly ttlSeconds: number;
  private readonly leewaySeconds: number;
  private readonly refreshGraceSeconds: number;

  constructor(
    private readonly config: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock
  ) {
    const secret = this.config.get<string>('TOKEN_SECRET');
    if (!isNonEmptyString(secret)) {
      // Fail fast at startup for server misconfiguration
      throw new Error('Missing token configuration: TOKEN_SECRET');
    }

    this.secret = new TextEncoder().encode(secret);
    this.issuer = this.config.get<string>('TOKEN_ISSUER') ?? 'exam-results-api';
    this.ttlSeconds = this.config.get<number>('TOKEN_TTL_SECONDS') ?? 1800;
    this.leewaySeconds = this.config.get<number>('TOKEN_CLOCK_LEEWAY_SECONDS') ?? 5;
    this.refreshGraceSeconds = this.config.get<number>('TOKEN_REFRESH_GRACE_SECONDS') ?? 0;
  }

  /**
   * Mint a token for (userId, role) expiring TOKEN_TTL_SECONDS from now
   */
  async issue(userId: string, role: Role): Promise<IssuedToken> {
    const iat = toEpochSeconds(this.clock.now());
    const exp = iat + this.ttlSeconds;

    const token = await new SignJWT({ role })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(userId)
      .setIssuer(this.issuer)
      .setJti(randomUUID())
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .sign(this.secret);

    return { token, issuedAt: new Date(iat * 1000), expiresAt: new Date(exp * 1000) };
  }

  /**
   * Check signature, issuer and expiry (with clock leeway)
   * @throws TokenMalformedException | TokenSignatureInvalidException | TokenExpiredException
   */
  async validate(token: string): Promise<SessionClaims> {
    return this.verify(token, this.leewaySeconds);
  }

  /**
   * Mint a new token for the identity of a currently valid one. A token that
   * expired less than TOKEN_REFRESH_GRACE_SECONDS ago is also accepted. The
   * presented token is not revoked.
   */
  async refresh(token: string): Promise<IssuedToken> {
    const claims = await this.verify(token, this.leewaySeconds + this.refreshGraceSeconds);
    return this.issue(claims.userId, claims.role);
  }

  private async verify(token: string, toleranceSeconds: number): Promise<SessionClaims> {
    try {
      const { payload } = await jwtVerify(token, this.secret, {
        algorithms: [ALGORITHM],
        issuer: this.issuer,
        clockTolerance: toleranceSeconds,
        currentDate: this.clock.now()
      });
      return toSessionClaims(payload);
    } catch (err: unknown) {
      if (err instanceof TokenMalformedException) throw err;
      // JWTExpired extends JWTClaimValidationFailed: check it first
      if (err instanceof errors.JWTExpired) throw new TokenExpiredException();
      if (err instanceof errors.JWSSignatureVerificationFailed) throw new TokenSignatureInvalidException();
      if (err instanceof errors.JOSEError) throw new TokenMalformedException();
      throw err;
    }
  }
}
