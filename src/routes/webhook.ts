import { Router, Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';
import { InvalidSignatureError, MalformedPayloadError } from '../errors';
import { rawBodyMiddleware } from '../middleware/rawBody';
import type { WalletService } from '../services/wallet';
import type { WebhookEvent } from '../webhooks/event';
import type { WebhookHandler } from '../webhooks/handler';
import { errorResponse } from '../webhooks/responses';
import type { WebhookMetrics } from './metrics';

export interface WebhookRouterOptions {
  handler: WebhookHandler;
  wallet: WalletService;
  logger: Logger;
  metrics: WebhookMetrics;
  signatureHeader: string;
  maxBodyBytes: number;
}

export function createWebhookRouter(options: WebhookRouterOptions): Router {
  const { handler, wallet, logger, metrics, signatureHeader, maxBodyBytes } = options;
  const router = Router();

  const handleWebhook = async (req: Request, res: Response, next: NextFunction) => {
    const signature = req.get(signatureHeader);

    if (!signature) {
      logger.warn('WEBHOOK REQUEST WITHOUT SIGNATURE');
      metrics.webhookCounter.inc({ type: 'unknown', status: 'unauthorized' });
      return res
        .status(401)
        .json(errorResponse('MISSING_SIGNATURE', 'Webhook signature is required'));
    }

    let event: WebhookEvent;
    try {
      event = handler.verifyAndParse(req.rawBody ?? Buffer.alloc(0), signature);
    } catch (error) {
      if (error instanceof InvalidSignatureError) {
        logger.warn('INVALID WEBHOOK SIGNATURE');
        metrics.webhookCounter.inc({ type: 'unknown', status: 'unauthorized' });
        return res
          .status(401)
          .json(errorResponse('INVALID_SIGNATURE', 'Webhook signature verification failed'));
      }
      if (error instanceof MalformedPayloadError) {
        logger.warn({ error: error.message }, 'INVALID WEBHOOK PAYLOAD');
        metrics.webhookCounter.inc({ type: 'unknown', status: 'invalid' });
        return res.status(400).json(errorResponse('INVALID_PAYLOAD', error.message));
      }
      return next(error);
    }

    try {
      const { reply, balanceDelta } = await wallet.process(event);

      metrics.webhookCounter.inc({ type: event.eventType, status: reply.status });
      if (balanceDelta !== 0) {
        metrics.balanceChanges.inc({ type: event.eventType });
      }

      logger.info(
        {
          eventType: event.eventType,
          playerId: event.playerId,
          transactionId: event.transactionId,
          status: reply.status,
        },
        'WEBHOOK PROCESSED'
      );

      return res.status(200).json(reply);
    } catch (error) {
      logger.error(
        { error, eventType: event.eventType, transactionId: event.transactionId },
        'WEBHOOK PROCESSING ERROR'
      );
      metrics.webhookCounter.inc({ type: event.eventType, status: 'failed' });

      return res
        .status(500)
        .json(errorResponse('INTERNAL_ERROR', 'Failed to process webhook'));
    }
  };

  router.post('/', rawBodyMiddleware(maxBodyBytes), handleWebhook);

  return router;
}
