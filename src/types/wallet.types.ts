import type { WebhookReply } from './webhook.types';

export interface WalletAccount {
  playerId: string;
  currency: string;
  /** Minor units. */
  balance: number;
  createdAt: Date;
  updatedAt: Date;
}

export type LedgerEntryType = 'bet' | 'win' | 'reward' | 'rollback';

export interface LedgerEntry {
  key: string;
  type: LedgerEntryType;
  playerId: string;
  transactionId: number;
  /** Signed change applied to the balance, in minor units. */
  delta: number;
  roundId: string;
  balanceAfter: number;
  createdAt: Date;
}

/** Synchronous view of the store used inside one atomic unit of work. */
export interface WalletLedger {
  findAccount(playerId: string): WalletAccount | undefined;
  createAccount(playerId: string, currency: string, balance: number): WalletAccount;
  updateBalance(playerId: string, delta: number): WalletAccount;
  findEntry(key: string): LedgerEntry | undefined;
  recordEntry(entry: Omit<LedgerEntry, 'createdAt'>): LedgerEntry;
}

export interface WalletStore {
  transaction<T>(work: (ledger: WalletLedger) => T): Promise<T>;
  countAccounts(): Promise<number>;
}

export interface WalletServiceOptions {
  startingBalance: number;
  defaultCurrency: string;
}

export interface WalletOutcome<R = WebhookReply> {
  reply: R;
  /** Change applied to the balance by this event, in minor units. */
  balanceDelta: number;
}
