import type { Context } from 'hono';
import { getCookie } from 'hono/cookie';
import type { RequestCredentials } from '@searchgate/core/src/auth/authenticator.js';
import type { AppEnv } from '../types.js';
import { renderErrorPage } from '../views/error-page.js';

export const SESSION_COOKIE = 'session';

export type ErrorStatus = 400 | 401 | 403 | 404 | 500;

/** True when the client asked for JSON in its Accept header. */
export function wantsJson(c: Context<AppEnv>): boolean {
  return (c.req.header('Accept') ?? '').includes('application/json');
}

export function readCredentials(c: Context<AppEnv>): RequestCredentials {
  return {
    sessionToken: getCookie(c, SESSION_COOKIE),
    authorization: c.req.header('Authorization'),
  };
}

/**
 * Error response in whichever form the client wants: the JSON error body,
 * or a small HTML page carrying the same message.
 */
export function respondError(
  c: Context<AppEnv>,
  status: ErrorStatus,
  code: string,
  message: string,
): Response | Promise<Response> {
  if (wantsJson(c)) {
    return c.json({ error: message, code, requestId: c.get('requestId') }, status);
  }
  return c.html(renderErrorPage(status, message), status);
}
