export { AggregatorClient, DEFAULT_BASE_URL } from './client';
export type { ClientOptions, ResolvedClientOptions } from './client';
export {
  AggregatorError,
  ApiKeyRequiredError,
  ConfigurationError,
  InvalidSignatureError,
  MalformedPayloadError,
  WebhookSecretRequiredError,
} from './errors';
export {
  WebhookEvent,
  WebhookHandler,
  alreadyProcessedResponse,
  errorResponse,
  insufficientFundsResponse,
  playerNotFoundResponse,
  successResponse,
  toMinorUnits,
} from './webhooks';
export { WebhookEventTypes } from './types/webhook.types';
export { generateWebhookSignature, verifyWebhookSignature } from './utils/verifySignature';
export { createApp } from './app';
export type { AppDependencies } from './app';
export { WalletService } from './services/wallet';
export { InMemoryWalletStore } from './services/walletStore';
export type * from './types';
