import { describe, it, expect, beforeEach } from 'vitest';
import { PersistenceError } from '@searchgate/shared/src/utils/errors.js';
import { createInMemoryWalletRepository } from './in-memory-wallet.repository.js';

describe('InMemoryWalletRepository', () => {
  let repo: ReturnType<typeof createInMemoryWalletRepository>;

  beforeEach(() => {
    repo = createInMemoryWalletRepository([
      { accountId: 'acct-1', balance: 10, member: false, admin: false },
    ]);
  });

  it('should return null for unknown accounts', async () => {
    expect(await repo.getAccount('nobody')).toBeNull();
  });

  it('should save and overwrite accounts', async () => {
    await repo.saveAccount({ accountId: 'acct-1', balance: 50, member: true, admin: false });
    expect(await repo.getAccount('acct-1')).toEqual({
      accountId: 'acct-1',
      balance: 50,
      member: true,
      admin: false,
    });
  });

  it('should deduct credits when the balance covers the amount', async () => {
    expect(await repo.deductCredits('acct-1', 4, 'web_search')).toBe(true);
    expect((await repo.getAccount('acct-1'))?.balance).toBe(6);
  });

  it('should refuse to deduct more than the balance', async () => {
    expect(await repo.deductCredits('acct-1', 11, 'web_search')).toBe(false);
    expect((await repo.getAccount('acct-1'))?.balance).toBe(10);
  });

  it('should reject deductions for unknown accounts', async () => {
    await expect(repo.deductCredits('nobody', 1, 'web_search')).rejects.toThrow(PersistenceError);
  });

  it('should count free searches per day up to the limit', async () => {
    expect(await repo.useFreeSearch('acct-1', '2026-03-01', 2)).toBe(true);
    expect(await repo.useFreeSearch('acct-1', '2026-03-01', 2)).toBe(true);
    expect(await repo.useFreeSearch('acct-1', '2026-03-01', 2)).toBe(false);

    expect(await repo.getFreeUsage('acct-1', '2026-03-01')).toBe(2);
    expect(await repo.getFreeUsage('acct-1', '2026-03-02')).toBe(0);
  });
});
