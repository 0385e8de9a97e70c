import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import type { Config } from '../types/config.types';

const configSchema = z.object({
  server: z.object({
    port: z.coerce.number().int().positive().default(3000),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  }),
  webhook: z.object({
    secret: z.string().min(16),
    signatureHeader: z
      .string()
      .min(1)
      .default('x-signature')
      .transform((header) => header.toLowerCase()),
    maxBodyBytes: z.coerce.number().int().positive().default(1024 * 1024),
  }),
  wallet: z.object({
    startingBalance: z.coerce.number().int().nonnegative().default(0),
    defaultCurrency: z.string().length(3).default('USD'),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
  }),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    },
    webhook: {
      secret: env.WEBHOOK_SECRET,
      signatureHeader: env.WEBHOOK_SIGNATURE_HEADER,
      maxBodyBytes: env.WEBHOOK_MAX_BODY_BYTES,
    },
    wallet: {
      startingBalance: env.WALLET_STARTING_BALANCE,
      defaultCurrency: env.WALLET_DEFAULT_CURRENCY,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new ConfigurationError(result.error.issues);
  }

  return result.data;
}
