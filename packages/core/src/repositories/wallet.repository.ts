import type { Account } from '@searchgate/shared/src/types/wallet.types.js';

/**
 * Ledger collaborator behind the quota gate. The two mutating methods are
 * conditional and must be atomic within the implementation.
 */
export interface WalletRepository {
  getAccount(accountId: string): Promise<Account | null>;
  saveAccount(account: Account): Promise<void>;
  /** Free searches already used on `date` (YYYY-MM-DD, UTC). */
  getFreeUsage(accountId: string, date: string): Promise<number>;
  /** Increments the day's usage if it is still below `dailyLimit`; returns whether it did. */
  useFreeSearch(accountId: string, date: string, dailyLimit: number): Promise<boolean>;
  /** Deducts `amount` if the balance covers it; returns whether it did. */
  deductCredits(accountId: string, amount: number, operation: string): Promise<boolean>;
}
