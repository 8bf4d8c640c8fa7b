import type { Firestore } from '@google-cloud/firestore';
import { FieldValue, Timestamp } from '@google-cloud/firestore';
import type { Account } from '@searchgate/shared/src/types/wallet.types.js';
import { PersistenceError } from '@searchgate/shared/src/utils/errors.js';
import type { WalletRepository } from '../repositories/wallet.repository.js';

const ACCOUNTS = 'wallets';
const DAILY_USAGE = 'daily-usage';
const TRANSACTIONS = 'wallet-transactions';

interface WalletDocument {
  balance: number;
  member: boolean;
  admin: boolean;
  updatedAt: Timestamp;
}

interface DailyUsageDocument {
  accountId: string;
  date: string;
  searches: number;
}

function accountFromDoc(accountId: string, data: WalletDocument): Account {
  return {
    accountId,
    balance: data.balance,
    member: data.member,
    admin: data.admin,
  };
}

function usageDocId(accountId: string, date: string): string {
  return `${accountId}_${date}`;
}

export function createFirestoreWalletRepository(db: Firestore): WalletRepository {
  const accountsRef = db.collection(ACCOUNTS);
  const usageRef = db.collection(DAILY_USAGE);
  const transactionsRef = db.collection(TRANSACTIONS);

  return {
    async getAccount(accountId: string): Promise<Account | null> {
      const doc = await accountsRef.doc(accountId).get();
      if (!doc.exists) {
        return null;
      }
      return accountFromDoc(accountId, doc.data() as WalletDocument);
    },

    async saveAccount(account: Account): Promise<void> {
      const docData: WalletDocument = {
        balance: account.balance,
        member: account.member,
        admin: account.admin,
        updatedAt: Timestamp.now(),
      };
      await accountsRef.doc(account.accountId).set(docData);
    },

    async getFreeUsage(accountId: string, date: string): Promise<number> {
      const doc = await usageRef.doc(usageDocId(accountId, date)).get();
      if (!doc.exists) {
        return 0;
      }
      return (doc.data() as DailyUsageDocument).searches;
    },

    async useFreeSearch(accountId: string, date: string, dailyLimit: number): Promise<boolean> {
      const docRef = usageRef.doc(usageDocId(accountId, date));

      return db.runTransaction(async (tx) => {
        const doc = await tx.get(docRef);
        const used = doc.exists ? (doc.data() as DailyUsageDocument).searches : 0;
        if (used >= dailyLimit) {
          return false;
        }
        const docData: DailyUsageDocument = { accountId, date, searches: used + 1 };
        tx.set(docRef, docData);
        return true;
      });
    },

    async deductCredits(accountId: string, amount: number, operation: string): Promise<boolean> {
      const accountRef = accountsRef.doc(accountId);

      return db.runTransaction(async (tx) => {
        const doc = await tx.get(accountRef);
        if (!doc.exists) {
          throw new PersistenceError(`Account not found: ${accountId}`);
        }
        const wallet = doc.data() as WalletDocument;
        if (wallet.balance < amount) {
          return false;
        }

        const now = Timestamp.now();
        tx.update(accountRef, { balance: FieldValue.increment(-amount), updatedAt: now });
        tx.create(transactionsRef.doc(), {
          accountId,
          type: 'spend',
          amount: -amount,
          balance: wallet.balance - amount,
          operation,
          createdAt: now,
        });
        return true;
      });
    },
  };
}
