export type { Config, LogLevel } from './config.types';
export type {
  KnownWebhookEventType,
  RawWebhookFields,
  WebhookEventFields,
  WebhookEventType,
  WebhookErrorReply,
  WebhookReply,
  WebhookReplyExtras,
  WebhookReplyValue,
  WebhookSuccessReply,
} from './webhook.types';
export type {
  LedgerEntry,
  LedgerEntryType,
  WalletAccount,
  WalletLedger,
  WalletOutcome,
  WalletServiceOptions,
  WalletStore,
} from './wallet.types';
export type { HealthResponse, ErrorResponse } from './api.types';
