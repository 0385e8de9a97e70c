import { Router, Request, Response } from 'express';
import type { Logger } from 'pino';
import type { HealthResponse } from '../types/api.types';
import type { WalletStore } from '../types/wallet.types';

export function createHealthRouter(store: WalletStore, logger: Logger): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    const healthResponse: HealthResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      services: {
        wallet: {
          status: 'down',
        },
      },
    };

    try {
      healthResponse.services.wallet = {
        status: 'up',
        accounts: await store.countAccounts(),
      };
    } catch (error) {
      logger.error({ error }, 'WALLET HEALTH CHECK FAILED');
      healthResponse.status = 'unhealthy';
    }

    const statusCode = healthResponse.status === 'healthy' ? 200 : 503;
    return res.status(statusCode).json(healthResponse);
  });

  return router;
}
