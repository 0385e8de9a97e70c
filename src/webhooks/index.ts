export { WebhookHandler } from './handler';
export { WebhookEvent } from './event';
export {
  alreadyProcessedResponse,
  errorResponse,
  insufficientFundsResponse,
  playerNotFoundResponse,
  successResponse,
  toMinorUnits,
} from './responses';
