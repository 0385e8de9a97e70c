import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { Config } from '../types/config.types';

export type { Logger };

type LoggerConfig = Pick<Config, 'server' | 'logging'> & {
  webhook: Pick<Config['webhook'], 'signatureHeader'>;
};

// pino-http logs request headers; the webhook signature must never reach the logs.
function redactedPaths(signatureHeader: string): string[] {
  return [`req.headers["${signatureHeader}"]`, 'req.headers.authorization'];
}

export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    name: 'aggregator-webhooks',
    level: config.logging.level,
    redact: redactedPaths(config.webhook.signatureHeader),
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      env: config.server.nodeEnv,
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  return pino({
    ...options,
    transport:
      config.server.nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
          }
        : undefined,
  });
}
