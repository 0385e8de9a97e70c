import { Router, Request, Response } from 'express';
import { Registry, collectDefaultMetrics, Counter } from 'prom-client';

export interface WebhookMetrics {
  register: Registry;
  webhookCounter: Counter<'type' | 'status'>;
  balanceChanges: Counter<'type'>;
}

export function createMetrics(): WebhookMetrics {
  const register = new Registry();

  collectDefaultMetrics({ register });

  return {
    register,
    webhookCounter: new Counter({
      name: 'webhook_requests_total',
      help: 'Total number of webhook requests',
      labelNames: ['type', 'status'],
      registers: [register],
    }),
    balanceChanges: new Counter({
      name: 'wallet_balance_changes_total',
      help: 'Webhook events that changed a wallet balance',
      labelNames: ['type'],
      registers: [register],
    }),
  };
}

export function createMetricsRouter({ register }: WebhookMetrics): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.set('Content-Type', register.contentType);
      const metrics = await register.metrics();
      return res.status(200).send(metrics);
    } catch (error) {
      return res.status(500).send('Error generating metrics');
    }
  });

  return router;
}
