import express, { Express, Request, Response, NextFunction } from 'express';
import pinoHttp from 'pino-http';
import type { Logger } from 'pino';
import { createHealthRouter } from './routes/health';
import { createMetrics, createMetricsRouter } from './routes/metrics';
import { createWebhookRouter } from './routes/webhook';
import { WalletService } from './services/wallet';
import { InMemoryWalletStore } from './services/walletStore';
import type { Config } from './types/config.types';
import type { WalletStore } from './types/wallet.types';
import { WebhookHandler } from './webhooks/handler';

export interface AppDependencies {
  config: Config;
  logger: Logger;
  store?: WalletStore;
}

export function createApp({
  config,
  logger,
  store = new InMemoryWalletStore(),
}: AppDependencies): Express {
  const app = express();
  const metrics = createMetrics();
  const handler = new WebhookHandler(config.webhook.secret);
  const wallet = new WalletService(store, config.wallet, logger);

  app.use(
    pinoHttp({
      logger,
      customLogLevel: (_req, res) => {
        if (res.statusCode >= 500) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      },
    })
  );

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: 'aggregator-webhooks',
      version: '1.0.0',
      status: 'running',
    });
  });

  app.use(
    '/webhooks',
    createWebhookRouter({
      handler,
      wallet,
      logger,
      metrics,
      signatureHeader: config.webhook.signatureHeader,
      maxBodyBytes: config.webhook.maxBodyBytes,
    })
  );
  app.use('/health', createHealthRouter(store, logger));
  app.use('/metrics', createMetricsRouter(metrics));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      error: 'NOT_FOUND',
      message: 'Endpoint not found',
    });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error: err }, 'UNHANDLED ERROR');

    res.status(500).json({
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });

  return app;
}
