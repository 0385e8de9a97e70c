import type { Logger } from 'pino';
import type { WebhookReply } from '../types/webhook.types';
import type {
  LedgerEntry,
  LedgerEntryType,
  WalletAccount,
  WalletOutcome,
  WalletServiceOptions,
  WalletStore,
} from '../types/wallet.types';
import type { WebhookEvent } from '../webhooks/event';
import {
  alreadyProcessedResponse,
  errorResponse,
  insufficientFundsResponse,
  playerNotFoundResponse,
  successResponse,
} from '../webhooks/responses';

const toMajor = (account: WalletAccount) => account.balance / 100;

const unchanged = (reply: WebhookReply): WalletOutcome => ({ reply, balanceDelta: 0 });

export class WalletService {
  constructor(
    private readonly store: WalletStore,
    private readonly options: WalletServiceOptions,
    private readonly logger: Logger
  ) {}

  async handle(event: WebhookEvent): Promise<WebhookReply> {
    const { reply } = await this.process(event);
    return reply;
  }

  async process(event: WebhookEvent): Promise<WalletOutcome> {
    if (event.isAuthenticate()) return this.authenticate(event);
    if (event.isBalanceCheck()) return this.balanceCheck(event);
    if (event.isBet()) return this.applyTransaction(event, 'bet');
    if (event.isWin()) return this.applyTransaction(event, 'win');
    if (event.isReward()) return this.applyTransaction(event, 'reward');
    if (event.isRollback()) return this.rollback(event);

    this.logger.warn({ eventType: event.eventType }, 'UNSUPPORTED WEBHOOK EVENT');
    return unchanged(
      errorResponse('UNSUPPORTED_EVENT', `Unsupported event type: ${event.eventType}`)
    );
  }

  private authenticate(event: WebhookEvent): Promise<WalletOutcome> {
    return this.store.transaction((ledger) => {
      let account = ledger.findAccount(event.playerId);

      if (!account) {
        account = ledger.createAccount(
          event.playerId,
          event.currency || this.options.defaultCurrency,
          this.options.startingBalance
        );
        this.logger.info({ playerId: account.playerId }, 'WALLET ACCOUNT CREATED');
      }

      return unchanged(
        successResponse(toMajor(account), {
          player_id: account.playerId,
          currency: account.currency,
        })
      );
    });
  }

  private balanceCheck(event: WebhookEvent): Promise<WalletOutcome> {
    return this.store.transaction((ledger) => {
      const account = ledger.findAccount(event.playerId);
      return unchanged(account ? successResponse(toMajor(account)) : playerNotFoundResponse());
    });
  }

  private applyTransaction(
    event: WebhookEvent,
    type: Exclude<LedgerEntryType, 'rollback'>
  ): Promise<WalletOutcome> {
    const { transactionId, amountMinorUnits } = event;

    return this.store.transaction((ledger) => {
      const account = ledger.findAccount(event.playerId);
      if (!account) {
        return unchanged(playerNotFoundResponse());
      }

      if (transactionId === undefined || amountMinorUnits === undefined) {
        return unchanged(
          errorResponse('INVALID_REQUEST', 'transaction_id and amount are required')
        );
      }
      if (amountMinorUnits < 0) {
        return unchanged(errorResponse('INVALID_AMOUNT', 'Amount must not be negative'));
      }

      const key = `${type}:${transactionId}`;
      const existing =
        ledger.findEntry(key) ??
        (type === 'bet' ? ledger.findEntry(`rollback:${transactionId}`) : undefined);
      if (existing) {
        if (existing.playerId !== account.playerId) {
          return unchanged(this.mismatch(existing, account));
        }
        this.logger.warn({ transactionId, type }, 'DUPLICATE TRANSACTION DETECTED');
        return unchanged(alreadyProcessedResponse(toMajor(account)));
      }

      if (type === 'bet' && account.balance < amountMinorUnits) {
        this.logger.info(
          { playerId: account.playerId, transactionId, balance: account.balance },
          'INSUFFICIENT FUNDS'
        );
        return unchanged(insufficientFundsResponse(toMajor(account)));
      }

      const delta = type === 'bet' ? -amountMinorUnits : amountMinorUnits;
      const updated = ledger.updateBalance(account.playerId, delta);
      ledger.recordEntry({
        key,
        type,
        playerId: account.playerId,
        transactionId,
        delta,
        roundId: event.roundId,
        balanceAfter: updated.balance,
      });

      this.logger.info(
        { playerId: updated.playerId, transactionId, type, delta, balance: updated.balance },
        'WALLET BALANCE UPDATED'
      );

      return {
        reply: successResponse(toMajor(updated), { transaction_id: transactionId }),
        balanceDelta: delta,
      };
    });
  }

  // Reverses the bet or win the same player recorded under this transaction ID.
  private rollback(event: WebhookEvent): Promise<WalletOutcome> {
    const { transactionId } = event;

    return this.store.transaction((ledger) => {
      const account = ledger.findAccount(event.playerId);
      if (!account) {
        return unchanged(playerNotFoundResponse());
      }
      if (transactionId === undefined) {
        return unchanged(errorResponse('INVALID_REQUEST', 'transaction_id is required'));
      }

      const key = `rollback:${transactionId}`;
      const previous = ledger.findEntry(key);
      if (previous) {
        return unchanged(
          previous.playerId === account.playerId
            ? alreadyProcessedResponse(toMajor(account))
            : this.mismatch(previous, account)
        );
      }

      const original =
        ledger.findEntry(`bet:${transactionId}`) ?? ledger.findEntry(`win:${transactionId}`);
      if (original && original.playerId !== account.playerId) {
        return unchanged(this.mismatch(original, account));
      }

      const delta = original ? -original.delta : 0;
      // A rolled-back win is never allowed to take the balance below zero.
      if (account.balance + delta < 0) {
        this.logger.warn(
          { playerId: account.playerId, transactionId, balance: account.balance, delta },
          'ROLLBACK EXCEEDS BALANCE'
        );
        return unchanged(insufficientFundsResponse(toMajor(account)));
      }

      const updated = delta === 0 ? account : ledger.updateBalance(account.playerId, delta);
      ledger.recordEntry({
        key,
        type: 'rollback',
        playerId: account.playerId,
        transactionId,
        delta,
        roundId: event.roundId,
        balanceAfter: updated.balance,
      });

      if (!original) {
        this.logger.warn({ transactionId }, 'ROLLBACK FOR UNKNOWN TRANSACTION');
      }

      return {
        reply: successResponse(toMajor(updated), { transaction_id: transactionId }),
        balanceDelta: delta,
      };
    });
  }

  private mismatch(entry: LedgerEntry, account: WalletAccount): WebhookReply {
    this.logger.warn(
      {
        transactionId: entry.transactionId,
        owner: entry.playerId,
        playerId: account.playerId,
      },
      'TRANSACTION OWNERSHIP MISMATCH'
    );
    return errorResponse(
      'TRANSACTION_MISMATCH',
      'Transaction belongs to a different player'
    );
  }
}
