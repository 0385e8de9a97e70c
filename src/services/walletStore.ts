import type { LedgerEntry, WalletAccount, WalletLedger, WalletStore } from '../types/wallet.types';

export class InMemoryWalletStore implements WalletStore {
  private readonly accounts = new Map<string, WalletAccount>();
  private readonly entries = new Map<string, LedgerEntry>();

  private readonly ledger: WalletLedger = {
    findAccount: (playerId) => this.accounts.get(playerId),
    createAccount: (playerId, currency, balance) => {
      const now = new Date();
      const account: WalletAccount = { playerId, currency, balance, createdAt: now, updatedAt: now };
      this.accounts.set(playerId, account);
      return account;
    },
    updateBalance: (playerId, delta) => {
      const account = this.accounts.get(playerId);
      if (!account) {
        throw new Error(`Unknown wallet account: ${playerId}`);
      }
      const updated: WalletAccount = {
        ...account,
        balance: account.balance + delta,
        updatedAt: new Date(),
      };
      this.accounts.set(playerId, updated);
      return updated;
    },
    findEntry: (key) => this.entries.get(key),
    recordEntry: (entry) => {
      const stored: LedgerEntry = { ...entry, createdAt: new Date() };
      this.entries.set(entry.key, stored);
      return stored;
    },
  };

  // The work runs to completion before any other request can touch the maps.
  async transaction<T>(work: (ledger: WalletLedger) => T): Promise<T> {
    return work(this.ledger);
  }

  async countAccounts(): Promise<number> {
    return this.accounts.size;
  }
}
