import type { ZodIssue } from 'zod';

export class AggregatorError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedPayloadError extends AggregatorError {
  constructor(message = 'Invalid JSON payload') {
    super(message, 'MALFORMED_PAYLOAD');
  }
}

export class InvalidSignatureError extends AggregatorError {
  constructor() {
    super('Invalid webhook signature', 'INVALID_SIGNATURE');
  }
}

export class ApiKeyRequiredError extends AggregatorError {
  constructor() {
    super('API key is required', 'API_KEY_REQUIRED');
  }
}

export class WebhookSecretRequiredError extends AggregatorError {
  constructor() {
    super('Webhook secret not configured', 'WEBHOOK_SECRET_REQUIRED');
  }
}

export class ConfigurationError extends AggregatorError {
  constructor(public readonly issues: ZodIssue[]) {
    super(
      `Configuration validation failed: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      'INVALID_CONFIGURATION'
    );
  }
}
