import { SignJWT, errors, jwtVerify, type JWTPayload } from 'jose';
import type { AuthConfig } from '../../config';
import {
  CredentialIssuer,
  InvalidCredentialError,
  IssuedToken,
  Subject,
} from './auth.types';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Stateless HMAC-signed JWTs carrying `sub`, `iat` and `exp`.
 * Nothing is stored server-side, so a token stays valid until it expires.
 */
export class JwtCredentialIssuer implements CredentialIssuer {
  private readonly key: Uint8Array;

  constructor(
    private readonly config: AuthConfig,
    private readonly now: Clock = systemClock,
  ) {
    this.key = new TextEncoder().encode(config.secret);
  }

  async issue(subject: Subject, ttlSeconds: number = this.config.accessTokenTtlSeconds): Promise<IssuedToken> {
    if (subject.length === 0) {
      throw new Error('Cannot issue a token without a subject');
    }
    const lifetime = Math.floor(ttlSeconds);
    if (!Number.isFinite(lifetime) || lifetime < 1) {
      throw new Error(`Token lifetime must be at least one second, got ${ttlSeconds}`);
    }

    const issuedAt = toEpochSeconds(this.now());
    const expiresAt = issuedAt + lifetime;

    const token = await new SignJWT({})
      .setProtectedHeader({ alg: this.config.algorithm, typ: 'JWT' })
      .setSubject(subject)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.key);

    return {
      token,
      tokenType: 'bearer',
      expiresAt: new Date(expiresAt * 1000),
      expiresInSeconds: lifetime,
    };
  }

  async validate(token: string): Promise<Subject> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.key, {
        algorithms: [this.config.algorithm],
        currentDate: this.now(),
        requiredClaims: ['sub', 'exp'],
      }));
    } catch (error) {
      throw toInvalidCredential(error);
    }

    if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
      throw new InvalidCredentialError('malformed', 'Token subject claim is empty');
    }
    return payload.sub;
  }
}

function toInvalidCredential(error: unknown): unknown {
  if (error instanceof errors.JWTExpired) {
    return new InvalidCredentialError('expired', 'Token has expired');
  }
  if (error instanceof errors.JWSSignatureVerificationFailed) {
    return new InvalidCredentialError('bad_signature', 'Token signature verification failed');
  }
  if (error instanceof errors.JOSEError) {
    return new InvalidCredentialError('malformed', `Token is malformed: ${error.code}`);
  }
  return error;
}
