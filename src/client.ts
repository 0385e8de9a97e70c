import { z } from 'zod';
import { ApiKeyRequiredError, WebhookSecretRequiredError } from './errors';
import { WebhookHandler } from './webhooks/handler';

export const DEFAULT_BASE_URL = 'https://api.iplaygames.ai';

const clientOptionsSchema = z.object({
  apiKey: z.string(),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  webhookSecret: z.string().optional(),
});

export type ClientOptions = z.input<typeof clientOptionsSchema>;
export type ResolvedClientOptions = z.output<typeof clientOptionsSchema>;

/**
 * Entry point for the aggregator SDK. Outbound API calls are made by the
 * generated API client; this class owns the options and the webhook handler.
 */
export class AggregatorClient {
  readonly options: ResolvedClientOptions;
  private webhookHandler?: WebhookHandler;

  constructor(options: ClientOptions) {
    if (!options.apiKey) {
      throw new ApiKeyRequiredError();
    }
    this.options = clientOptionsSchema.parse(options);
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /** Headers every outbound API request carries. */
  defaultHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }

  webhooks(): WebhookHandler {
    if (!this.webhookHandler) {
      if (!this.options.webhookSecret) {
        throw new WebhookSecretRequiredError();
      }
      this.webhookHandler = new WebhookHandler(this.options.webhookSecret);
    }
    return this.webhookHandler;
  }

  createWebhookHandler(secret: string): WebhookHandler {
    return new WebhookHandler(secret);
  }
}
