import { createApp } from './app';
import { loadConfig } from './utils/config';
import { createLogger } from './utils/logger';
import type { Config } from './types/config.types';

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

const logger = createLogger(config);
const app = createApp({ config, logger });

const server = app.listen(config.server.port, () => {
  logger.info(
    {
      port: config.server.port,
      nodeEnv: config.server.nodeEnv,
      signatureHeader: config.webhook.signatureHeader,
    },
    'SERVER STARTED'
  );
});

const gracefulShutdown = () => {
  logger.info('SHUTTING DOWN SERVER');

  server.close(() => {
    logger.info('SERVER CLOSED');
    process.exit(0);
  });

  setTimeout(() => {
    logger.error('FORCEFULLY SHUTTING DOWN SERVER');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);

process.on('unhandledRejection', (reason, promise) => {
  logger.error({ reason, promise }, 'UNHANDLED PROMISE REJECTION');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'UNCAUGHT EXCEPTION');
  process.exit(1);
});
