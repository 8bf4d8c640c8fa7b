import type { Context } from 'hono';
import { ZodError } from 'zod';
import { errors as joseErrors } from 'jose';
import { PersistenceError, ToolError } from '@searchgate/shared/src/utils/errors.js';
import { createChildLogger } from '@searchgate/shared/src/logger.js';
import type { AppEnv } from '../types.js';
import { wantsJson } from './negotiation.js';
import { renderErrorPage } from '../views/error-page.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

function respond(c: Context<AppEnv>, body: ErrorResponse, status: 400 | 401 | 500): Response | Promise<Response> {
  if (wantsJson(c)) {
    return c.json(body, status);
  }
  return c.html(renderErrorPage(status, body.error), status);
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response | Promise<Response> {
  const requestId = c.get('requestId');

  if (err instanceof joseErrors.JOSEError) {
    return respond(c, { error: 'Invalid or expired token', code: 'UNAUTHORIZED', requestId }, 401);
  }

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return respond(c, { error: 'Validation failed', code: 'VALIDATION_ERROR', requestId, details }, 400);
  }

  if (err instanceof ToolError) {
    log.warn({ requestId, error: err.message }, 'Tool call rejected');
    return respond(c, { error: err.message, code: err.code, requestId }, 400);
  }

  if (err instanceof PersistenceError) {
    log.error({ requestId, error: err.message }, 'Persistence error');
    return respond(c, { error: 'Internal server error', code: 'INTERNAL_ERROR', requestId }, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  return respond(c, { error: 'Internal server error', code: 'INTERNAL_ERROR', requestId }, 500);
}
