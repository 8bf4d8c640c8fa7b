import { describe, it, expect, beforeEach } from 'vitest';
import { Firestore } from '@google-cloud/firestore';
import { createFirestoreWalletRepository } from './firestore-wallet.repository.js';

describe('FirestoreWalletRepository (integration)', () => {
  const db = new Firestore({ projectId: 'searchgate-test' });
  const repo = createFirestoreWalletRepository(db);

  beforeEach(async () => {
    for (const name of ['wallets', 'daily-usage', 'wallet-transactions']) {
      const docs = await db.collection(name).listDocuments();
      for (const doc of docs) {
        await doc.delete();
      }
    }
  });

  it('should return null for unknown accounts', async () => {
    expect(await repo.getAccount('nobody')).toBeNull();
  });

  it('should save and read an account', async () => {
    await repo.saveAccount({ accountId: 'acct-1', balance: 25, member: false, admin: true });

    expect(await repo.getAccount('acct-1')).toEqual({
      accountId: 'acct-1',
      balance: 25,
      member: false,
      admin: true,
    });
  });

  it('should deduct credits and write a ledger transaction', async () => {
    await repo.saveAccount({ accountId: 'acct-1', balance: 10, member: false, admin: false });

    expect(await repo.deductCredits('acct-1', 5, 'web_search')).toBe(true);
    expect((await repo.getAccount('acct-1'))?.balance).toBe(5);

    const transactions = await db.collection('wallet-transactions').get();
    expect(transactions.size).toBe(1);
    expect(transactions.docs[0].get('operation')).toBe('web_search');
  });

  it('should not deduct more than the balance', async () => {
    await repo.saveAccount({ accountId: 'acct-1', balance: 3, member: false, admin: false });

    expect(await repo.deductCredits('acct-1', 5, 'web_search')).toBe(false);
    expect((await repo.getAccount('acct-1'))?.balance).toBe(3);
  });

  it('should stop granting free searches at the daily limit', async () => {
    expect(await repo.useFreeSearch('acct-1', '2026-03-01', 1)).toBe(true);
    expect(await repo.useFreeSearch('acct-1', '2026-03-01', 1)).toBe(false);
    expect(await repo.getFreeUsage('acct-1', '2026-03-01')).toBe(1);
  });
});
