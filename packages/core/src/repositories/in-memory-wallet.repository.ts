import type { Account } from '@searchgate/shared/src/types/wallet.types.js';
import { PersistenceError } from '@searchgate/shared/src/utils/errors.js';
import type { WalletRepository } from './wallet.repository.js';

function usageKey(accountId: string, date: string): string {
  return `${accountId}:${date}`;
}

export function createInMemoryWalletRepository(
  initialAccounts: readonly Account[] = [],
): WalletRepository {
  const accounts = new Map<string, Account>();
  const dailyUsage = new Map<string, number>();

  for (const account of initialAccounts) {
    accounts.set(account.accountId, account);
  }

  return {
    getAccount(accountId: string): Promise<Account | null> {
      return Promise.resolve(accounts.get(accountId) ?? null);
    },

    saveAccount(account: Account): Promise<void> {
      accounts.set(account.accountId, account);
      return Promise.resolve();
    },

    getFreeUsage(accountId: string, date: string): Promise<number> {
      return Promise.resolve(dailyUsage.get(usageKey(accountId, date)) ?? 0);
    },

    useFreeSearch(accountId: string, date: string, dailyLimit: number): Promise<boolean> {
      const key = usageKey(accountId, date);
      const used = dailyUsage.get(key) ?? 0;
      if (used >= dailyLimit) {
        return Promise.resolve(false);
      }
      dailyUsage.set(key, used + 1);
      return Promise.resolve(true);
    },

    deductCredits(accountId: string, amount: number): Promise<boolean> {
      const account = accounts.get(accountId);
      if (!account) {
        return Promise.reject(new PersistenceError(`Account not found: ${accountId}`));
      }
      if (account.balance < amount) {
        return Promise.resolve(false);
      }
      accounts.set(accountId, { ...account, balance: account.balance - amount });
      return Promise.resolve(true);
    },
  };
}
