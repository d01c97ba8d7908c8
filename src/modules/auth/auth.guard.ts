import type { Request, RequestHandler } from 'express';
import { UnauthenticatedError } from '../../common/errors/app-error';
import { logPrefix, type RequestContext } from '../../common/types/outcome';
import '../../types/express';
import { CredentialIssuer, InvalidCredentialError, Subject } from './auth.types';

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/** Returns the token of a `Bearer` authorization header, or undefined for any other shape. */
export function extractBearerToken(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  return BEARER_PATTERN.exec(header)?.[1];
}

export class AccessGuard {
  constructor(private readonly issuer: CredentialIssuer) {}

  async authorize(rawToken: string | undefined, context?: RequestContext): Promise<Subject> {
    if (rawToken === undefined || rawToken.length === 0) {
      throw new UnauthenticatedError('Not authenticated');
    }

    try {
      return await this.issuer.validate(rawToken);
    } catch (error) {
      if (error instanceof InvalidCredentialError) {
        console.warn(`${logPrefix(context, 'auth')} Rejected credential: ${error.reason}`);
        throw new UnauthenticatedError();
      }
      throw error;
    }
  }
}

/** Resolves the caller's subject from the bearer token before any protected handler runs. */
export function requireAuth(guard: AccessGuard): RequestHandler {
  return (req, _res, next) => {
    void guard
      .authorize(extractBearerToken(req.get('authorization')), { requestId: req.requestId })
      .then((subject) => {
        req.subject = subject;
        next();
      }, (error: unknown) => next(error));
  };
}

export function requireSubject(req: Request): Subject {
  if (req.subject === undefined) {
    throw new UnauthenticatedError('Not authenticated');
  }
  return req.subject;
}
