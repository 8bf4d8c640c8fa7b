import { createMiddleware } from 'hono/factory';
import type { Authenticator } from '@searchgate/core/src/auth/authenticator.js';
import type { WalletRepository } from '@searchgate/core/src/repositories/wallet.repository.js';
import type { AppEnv } from '../types.js';
import { readCredentials, respondError } from './negotiation.js';

export interface AdminMiddlewareDeps {
  readonly authenticator: Authenticator;
  readonly walletRepository: WalletRepository;
}

export function createAdminMiddleware(
  deps: AdminMiddlewareDeps,
): ReturnType<typeof createMiddleware<AppEnv>> {
  return createMiddleware<AppEnv>(async (c, next) => {
    const session = await deps.authenticator.authenticate(readCredentials(c));
    if (!session) {
      return respondError(c, 401, 'UNAUTHORIZED', 'Authentication required');
    }

    const account = await deps.walletRepository.getAccount(session.accountId);
    if (!account?.admin) {
      return respondError(c, 403, 'FORBIDDEN', 'Admin access required');
    }

    c.set('account', account);
    await next();
  });
}
