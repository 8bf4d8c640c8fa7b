import { createChildLogger } from '@searchgate/shared/src/logger.js';
import type { QuotaDecision, QuotaOperation } from '@searchgate/shared/src/types/wallet.types.js';
import { QuotaError } from '@searchgate/shared/src/utils/errors.js';
import type { WalletRepository } from '../repositories/wallet.repository.js';

const log = createChildLogger('quota:gate');

export interface QuotaPolicy {
  readonly costs: Readonly<Record<QuotaOperation, number>>;
  readonly freeDailySearches: number;
}

export interface QuotaGateDeps {
  readonly walletRepository: WalletRepository;
  readonly now?: () => Date;
}

/**
 * Decides whether an account may run a priced operation and, separately,
 * charges for it. `check` has no side effects; callers invoke `consume`
 * only once the operation has succeeded.
 */
export interface QuotaGate {
  check(accountId: string, operation: QuotaOperation): Promise<QuotaDecision>;
  consume(accountId: string, operation: QuotaOperation): Promise<void>;
}

export const DEFAULT_QUOTA_POLICY: QuotaPolicy = {
  costs: { web_search: 5 },
  freeDailySearches: 10,
};

function utcDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function createQuotaGate(deps: QuotaGateDeps, policy: QuotaPolicy = DEFAULT_QUOTA_POLICY): QuotaGate {
  const { walletRepository } = deps;
  const now = deps.now ?? ((): Date => new Date());

  return {
    async check(accountId: string, operation: QuotaOperation): Promise<QuotaDecision> {
      const cost = policy.costs[operation];
      const account = await walletRepository.getAccount(accountId);
      if (!account) {
        return { allowed: false, remaining: 0, cost, reason: 'account not found' };
      }

      if (account.member || account.admin) {
        return { allowed: true, remaining: Number.POSITIVE_INFINITY, cost: 0 };
      }

      const used = await walletRepository.getFreeUsage(accountId, utcDate(now()));
      const freeRemaining = Math.max(0, policy.freeDailySearches - used);
      if (freeRemaining > 0) {
        return { allowed: true, remaining: freeRemaining, cost: 0 };
      }

      if (account.balance >= cost) {
        return { allowed: true, remaining: account.balance, cost };
      }

      return { allowed: false, remaining: account.balance, cost, reason: 'insufficient credits' };
    },

    async consume(accountId: string, operation: QuotaOperation): Promise<void> {
      const account = await walletRepository.getAccount(accountId);
      if (!account) {
        throw new QuotaError(`Account not found: ${accountId}`);
      }

      if (account.member || account.admin) {
        return;
      }

      if (await walletRepository.useFreeSearch(accountId, utcDate(now()), policy.freeDailySearches)) {
        log.debug({ accountId, operation }, 'Consumed free search');
        return;
      }

      const cost = policy.costs[operation];
      const deducted = await walletRepository.deductCredits(accountId, cost, operation);
      if (!deducted) {
        throw new QuotaError(`Insufficient credits for ${operation}: ${accountId}`);
      }
      log.debug({ accountId, operation, cost }, 'Deducted credits');
    },
  };
}
