/** Externally chosen identifier of an enrolled person. */
export type Subject = string;

export interface IssuedToken {
  token: string;
  tokenType: 'bearer';
  expiresAt: Date;
  expiresInSeconds: number;
}

export interface CredentialIssuer {
  /** Signs a token for `subject`, valid for `ttlSeconds` (the configured TTL when omitted). */
  issue(subject: Subject, ttlSeconds?: number): Promise<IssuedToken>;
  /** Returns the token's subject or throws `InvalidCredentialError`. */
  validate(token: string): Promise<Subject>;
}

export type InvalidCredentialReason = 'expired' | 'bad_signature' | 'malformed';

export class InvalidCredentialError extends Error {
  public readonly reason: InvalidCredentialReason;

  constructor(reason: InvalidCredentialReason, message: string) {
    super(message);
    this.name = 'InvalidCredentialError';
    this.reason = reason;
  }
}
