import pino from 'pino';
import { beforeEach, describe, expect, it } from 'vitest';
import { WebhookHandler } from '../webhooks/handler';
import { WalletService } from './wallet';
import { InMemoryWalletStore } from './walletStore';

const handler = new WebhookHandler('test-secret');
const event = (fields: Record<string, unknown>) => handler.parse(JSON.stringify(fields));

describe('WalletService', () => {
  let store: InMemoryWalletStore;
  let wallet: WalletService;

  beforeEach(async () => {
    store = new InMemoryWalletStore();
    wallet = new WalletService(
      store,
      { startingBalance: 10000, defaultCurrency: 'USD' },
      pino({ level: 'silent' })
    );
    await wallet.handle(event({ type: 'authenticate', player_id: 'player_1', currency: 'EUR' }));
  });

  it('creates the account on first authentication and reuses it after', async () => {
    expect(
      await wallet.handle(event({ type: 'authenticate', player_id: 'player_1' }))
    ).toEqual({ status: 'success', balance: 10000, player_id: 'player_1', currency: 'EUR' });

    expect(
      await wallet.handle(event({ type: 'authenticate', player_id: 'player_2' }))
    ).toEqual({ status: 'success', balance: 10000, player_id: 'player_2', currency: 'USD' });
    expect(await store.countAccounts()).toBe(2);
  });

  it('reports balances and unknown players', async () => {
    expect(await wallet.handle(event({ type: 'balance_check', player_id: 'player_1' }))).toEqual({
      status: 'success',
      balance: 10000,
    });
    expect(await wallet.handle(event({ type: 'balance_check', player_id: 'nobody' }))).toEqual({
      status: 'error',
      error_code: 'PLAYER_NOT_FOUND',
      error_message: 'Player not found',
    });
  });

  it('debits a bet once per transaction ID', async () => {
    const bet = event({ type: 'bet', player_id: 'player_1', amount: 1000, transaction_id: 12345 });

    expect(await wallet.handle(bet)).toEqual({
      status: 'success',
      balance: 9000,
      transaction_id: 12345,
    });
    expect(await wallet.handle(bet)).toEqual({
      status: 'success',
      balance: 9000,
      already_processed: true,
    });
  });

  it('refuses bets above the balance', async () => {
    const reply = await wallet.handle(
      event({ type: 'bet', player_id: 'player_1', amount: 10001, transaction_id: 1 })
    );

    expect(reply).toEqual({
      status: 'error',
      error_code: 'INSUFFICIENT_FUNDS',
      error_message: 'Insufficient funds',
      balance: 10000,
    });
  });

  it('requires a transaction ID and amount for financial events', async () => {
    const reply = await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 100 }));
    expect(reply).toEqual({
      status: 'error',
      error_code: 'INVALID_REQUEST',
      error_message: 'transaction_id and amount are required',
    });
  });

  it('rejects negative amounts', async () => {
    const reply = await wallet.handle(
      event({ type: 'win', player_id: 'player_1', amount: -100, transaction_id: 5 })
    );
    expect(reply.status).toBe('error');
    expect(reply).toMatchObject({ error_code: 'INVALID_AMOUNT' });
  });

  it('credits wins and rewards', async () => {
    expect(
      await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 2550, transaction_id: 2 }))
    ).toEqual({ status: 'success', balance: 12550, transaction_id: 2 });

    expect(
      await wallet.handle(
        event({
          type: 'reward',
          player_id: 'player_1',
          amount: 500,
          transaction_id: 3,
          reward_type: 'cashback',
        })
      )
    ).toEqual({ status: 'success', balance: 13050, transaction_id: 3 });
  });

  it('rolls back a bet exactly once', async () => {
    await wallet.handle(event({ type: 'bet', player_id: 'player_1', amount: 400, transaction_id: 77 }));
    const rollback = event({ type: 'rollback', player_id: 'player_1', transaction_id: 77 });

    expect(await wallet.handle(rollback)).toEqual({
      status: 'success',
      balance: 10000,
      transaction_id: 77,
    });
    expect(await wallet.handle(rollback)).toEqual({
      status: 'success',
      balance: 10000,
      already_processed: true,
    });
  });

  it('rolls back a win', async () => {
    await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 300, transaction_id: 8 }));

    expect(
      await wallet.handle(event({ type: 'rollback', player_id: 'player_1', transaction_id: 8 }))
    ).toEqual({ status: 'success', balance: 10000, transaction_id: 8 });
  });

  it('acknowledges a rollback that arrives before its bet and ignores the late bet', async () => {
    expect(
      await wallet.handle(event({ type: 'rollback', player_id: 'player_1', transaction_id: 90 }))
    ).toEqual({ status: 'success', balance: 10000, transaction_id: 90 });

    expect(
      await wallet.handle(event({ type: 'bet', player_id: 'player_1', amount: 100, transaction_id: 90 }))
    ).toEqual({ status: 'success', balance: 10000, already_processed: true });
  });

  describe('transactions shared between players', () => {
    const mismatch = {
      status: 'error',
      error_code: 'TRANSACTION_MISMATCH',
      error_message: 'Transaction belongs to a different player',
    };

    beforeEach(async () => {
      await wallet.handle(event({ type: 'authenticate', player_id: 'player_2' }));
    });

    it("refuses to roll back another player's bet", async () => {
      await wallet.handle(event({ type: 'bet', player_id: 'player_1', amount: 5000, transaction_id: 1 }));

      expect(
        await wallet.handle(event({ type: 'rollback', player_id: 'player_2', transaction_id: 1 }))
      ).toEqual(mismatch);
      expect(await wallet.handle(event({ type: 'balance_check', player_id: 'player_2' }))).toEqual({
        status: 'success',
        balance: 10000,
      });

      // the owner can still roll it back afterwards
      expect(
        await wallet.handle(event({ type: 'rollback', player_id: 'player_1', transaction_id: 1 }))
      ).toEqual({ status: 'success', balance: 10000, transaction_id: 1 });
    });

    it("refuses to roll back another player's win", async () => {
      await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 700, transaction_id: 2 }));

      expect(
        await wallet.handle(event({ type: 'rollback', player_id: 'player_2', transaction_id: 2 }))
      ).toEqual(mismatch);
      expect(await wallet.handle(event({ type: 'balance_check', player_id: 'player_1' }))).toEqual({
        status: 'success',
        balance: 10700,
      });
    });

    it("refuses a bet or win that reuses another player's transaction ID", async () => {
      await wallet.handle(event({ type: 'bet', player_id: 'player_1', amount: 100, transaction_id: 3 }));
      await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 100, transaction_id: 4 }));

      expect(
        await wallet.handle(event({ type: 'bet', player_id: 'player_2', amount: 100, transaction_id: 3 }))
      ).toEqual(mismatch);
      expect(
        await wallet.handle(event({ type: 'win', player_id: 'player_2', amount: 100, transaction_id: 4 }))
      ).toEqual(mismatch);
    });

    it("refuses to repeat another player's rollback", async () => {
      await wallet.handle(event({ type: 'rollback', player_id: 'player_1', transaction_id: 5 }));

      expect(
        await wallet.handle(event({ type: 'rollback', player_id: 'player_2', transaction_id: 5 }))
      ).toEqual(mismatch);
    });
  });

  it('refuses a win rollback that would take the balance below zero', async () => {
    await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 3000, transaction_id: 10 }));
    await wallet.handle(event({ type: 'bet', player_id: 'player_1', amount: 12000, transaction_id: 11 }));

    const rollback = event({ type: 'rollback', player_id: 'player_1', transaction_id: 10 });
    expect(await wallet.handle(rollback)).toEqual({
      status: 'error',
      error_code: 'INSUFFICIENT_FUNDS',
      error_message: 'Insufficient funds',
      balance: 1000,
    });

    // nothing was recorded, so the rollback goes through once funds return
    await wallet.handle(event({ type: 'win', player_id: 'player_1', amount: 2000, transaction_id: 12 }));
    expect(await wallet.handle(rollback)).toEqual({
      status: 'success',
      balance: 0,
      transaction_id: 10,
    });
  });

  it('reports the balance change of each processed event', async () => {
    const bet = event({ type: 'bet', player_id: 'player_1', amount: 250, transaction_id: 20 });

    expect((await wallet.process(bet)).balanceDelta).toBe(-250);
    expect((await wallet.process(bet)).balanceDelta).toBe(0);
    expect(
      (await wallet.process(event({ type: 'rollback', player_id: 'player_1', transaction_id: 21 })))
        .balanceDelta
    ).toBe(0);
    expect(
      (await wallet.process(event({ type: 'rollback', player_id: 'player_1', transaction_id: 20 })))
        .balanceDelta
    ).toBe(250);
  });

  it('replies with an error for unsupported event types', async () => {
    expect(await wallet.handle(event({ type: 'jackpot_win', player_id: 'player_1' }))).toEqual({
      status: 'error',
      error_code: 'UNSUPPORTED_EVENT',
      error_message: 'Unsupported event type: jackpot_win',
    });
  });
});
