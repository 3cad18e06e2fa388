import type { NextFunction, Request, Response } from 'express';
import type { AuthUser } from '../src/types';
import { errorMessage, UnauthenticatedError } from '../src/utils/errorHandler';

/**
 * Claims read from a verified ID token. `firebase-admin`'s `Auth` instance
 * satisfies `TokenVerifier` with its `DecodedIdToken`.
 */
export interface VerifiedToken {
  uid: string;
  email?: string;
  email_verified?: boolean;
  name?: unknown;
}

export interface TokenVerifier {
  verifyIdToken(idToken: string): Promise<VerifiedToken>;
}

export function extractBearerToken(authorizationHeader: string | undefined): string {
  if (!authorizationHeader?.trim()) {
    throw new UnauthenticatedError('Authorization token required');
  }

  const [scheme, ...rest] = authorizationHeader.trim().split(/\s+/);
  if (scheme.toLowerCase() !== 'bearer') {
    throw new UnauthenticatedError('Invalid authentication scheme');
  }

  const token = rest.join(' ');
  if (!token) {
    throw new UnauthenticatedError('Authorization token required');
  }
  return token;
}

export class AuthGateway {
  constructor(private readonly verifier: TokenVerifier) {}

  async authenticate(authorizationHeader: string | undefined): Promise<AuthUser> {
    const token = extractBearerToken(authorizationHeader);

    let decoded: VerifiedToken;
    try {
      decoded = await this.verifier.verifyIdToken(token);
    } catch (error) {
      console.warn(`🔒 Token verification failed: ${errorMessage(error)}`);
      throw new UnauthenticatedError('Invalid or expired token', { cause: error });
    }

    if (!decoded.uid) {
      throw new UnauthenticatedError('Invalid or expired token');
    }

    return {
      uid: decoded.uid,
      email: decoded.email ?? null,
      displayName: typeof decoded.name === 'string' ? decoded.name : null,
      emailVerified: decoded.email_verified ?? false,
    };
  }
}

function isAuthUser(value: unknown): value is AuthUser {
  return typeof value === 'object' && value !== null && 'uid' in value && typeof value.uid === 'string';
}

export function requireAuth(gateway: AuthGateway) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.locals.user = await gateway.authenticate(req.header('authorization'));
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Reads the user `requireAuth` stored. Throws if the route was mounted
 * without the middleware.
 */
export function currentUser(res: Response): AuthUser {
  const user: unknown = res.locals.user;
  if (!isAuthUser(user)) {
    throw new UnauthenticatedError();
  }
  return user;
}
