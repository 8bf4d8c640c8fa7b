import { SignJWT, errors as joseErrors, jwtVerify } from 'jose';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import type { AuthSession, Authenticator, RequestCredentials } from './authenticator.js';

const log = createChildLogger('auth:jwt');

export const SESSION_ISSUER = 'searchgate';
const ALGORITHM = 'HS256';

export interface JwtAuthenticatorConfig {
  readonly secret: string;
  readonly issuer?: string;
}

function secretKey(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Picks the session token from the cookie, falling back to the
 * Authorization header with or without a `Bearer ` prefix.
 */
export function extractToken(credentials: RequestCredentials): string | undefined {
  if (credentials.sessionToken) {
    return credentials.sessionToken;
  }
  const header = credentials.authorization?.trim();
  if (!header) {
    return undefined;
  }
  const token = header.startsWith('Bearer ') ? header.slice(7).trim() : header;
  return token || undefined;
}

export async function signSessionToken(
  secret: string,
  accountId: string,
  options: { readonly issuer?: string; readonly expiresIn?: string } = {},
): Promise<string> {
  return new SignJWT({})
    .setProtectedHeader({ alg: ALGORITHM })
    .setSubject(accountId)
    .setIssuer(options.issuer ?? SESSION_ISSUER)
    .setIssuedAt()
    .setExpirationTime(options.expiresIn ?? '30d')
    .sign(secretKey(secret));
}

export function createJwtAuthenticator(config: JwtAuthenticatorConfig): Authenticator {
  const key = secretKey(config.secret);
  const issuer = config.issuer ?? SESSION_ISSUER;

  return {
    async authenticate(credentials: RequestCredentials): Promise<AuthSession | null> {
      const token = extractToken(credentials);
      if (!token) {
        return null;
      }

      try {
        const { payload } = await jwtVerify(token, key, { issuer, algorithms: [ALGORITHM] });
        if (!payload.sub) {
          log.debug('Session token missing sub claim');
          return null;
        }
        return { accountId: payload.sub };
      } catch (error) {
        if (error instanceof joseErrors.JOSEError) {
          log.debug({ code: error.code }, 'Rejected session token');
          return null;
        }
        throw error;
      }
    },
  };
}
