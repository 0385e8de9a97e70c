import type {
  WebhookErrorReply,
  WebhookReplyExtras,
  WebhookSuccessReply,
} from '../types/webhook.types';

// Every balance leaving the service is an integer count of minor units.
export function toMinorUnits(majorUnits: number): number {
  return Math.round(majorUnits * 100);
}

export function successResponse(
  balanceMajorUnits: number,
  extraFields: WebhookReplyExtras = {}
): WebhookSuccessReply {
  return {
    ...extraFields,
    status: 'success',
    balance: toMinorUnits(balanceMajorUnits),
  };
}

export function errorResponse(code: string, message: string): WebhookErrorReply {
  return {
    status: 'error',
    error_code: code,
    error_message: message,
  };
}

export function playerNotFoundResponse(): WebhookErrorReply {
  return errorResponse('PLAYER_NOT_FOUND', 'Player not found');
}

export function insufficientFundsResponse(balanceMajorUnits: number): WebhookErrorReply {
  return {
    ...errorResponse('INSUFFICIENT_FUNDS', 'Insufficient funds'),
    balance: toMinorUnits(balanceMajorUnits),
  };
}

export function alreadyProcessedResponse(balanceMajorUnits: number): WebhookSuccessReply {
  return successResponse(balanceMajorUnits, { already_processed: true });
}
