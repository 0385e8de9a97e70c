import { InvalidSignatureError, MalformedPayloadError } from '../errors';
import type {
  RawWebhookFields,
  WebhookErrorReply,
  WebhookReplyExtras,
  WebhookSuccessReply,
} from '../types/webhook.types';
import { verifyWebhookSignature, type SignablePayload } from '../utils/verifySignature';
import { WebhookEvent } from './event';
import {
  isRecord,
  pickField,
  readBoolean,
  readInteger,
  readNumber,
  readString,
} from './fields';
import {
  alreadyProcessedResponse,
  errorResponse,
  insufficientFundsResponse,
  playerNotFoundResponse,
  successResponse,
} from './responses';

/**
 * Verifies and normalizes webhooks sent by the aggregator. Holds nothing but
 * the shared secret, so one instance can serve any number of requests.
 */
export class WebhookHandler {
  constructor(private readonly secret: string) {}

  verify(payload: SignablePayload, signature: string): boolean {
    return verifyWebhookSignature(payload, signature, this.secret);
  }

  /**
   * @throws {MalformedPayloadError} when the payload is not a JSON object
   */
  parse(payload: SignablePayload): WebhookEvent {
    const raw = decodePayload(payload);
    const text = (...keys: string[]) => pickField(raw, keys, readString) ?? '';
    const integer = (...keys: string[]) => pickField(raw, keys, readInteger);

    return new WebhookEvent({
      eventType: text('type'),
      playerId: text('player_id'),
      currency: text('currency'),
      timestamp: text('timestamp'),
      gameId: integer('game_id'),
      gameType: text('game_type'),
      transactionId: integer('transaction_id'),
      amountMinorUnits: integer('amount'),
      sessionId: text('session_id'),
      roundId: text('round_id'),
      rewardType: text('reward_type'),
      rewardTitle: text('reward_title'),
      isFreespin: pickField(raw, ['is_freespin_round', 'is_freespin'], readBoolean) ?? false,
      freespinId: text('freespin_id', 'bonus_id'),
      freespinTotal: integer('freespin_total'),
      freespinsRemaining: integer('freespins_remaining', 'freespin_left'),
      freespinRoundNumber: integer('freespin_round_number'),
      freespinTotalWinnings: pickField(raw, ['freespin_total_winnings'], readNumber),
      rawFields: raw,
    });
  }

  /**
   * Parsing only happens once the sender is authenticated.
   *
   * @throws {InvalidSignatureError} when the signature does not match
   * @throws {MalformedPayloadError} when the verified payload is not a JSON object
   */
  verifyAndParse(payload: SignablePayload, signature: string): WebhookEvent {
    if (!this.verify(payload, signature)) {
      throw new InvalidSignatureError();
    }
    return this.parse(payload);
  }

  successResponse(balance: number, extra?: WebhookReplyExtras): WebhookSuccessReply {
    return successResponse(balance, extra);
  }

  errorResponse(code: string, message: string): WebhookErrorReply {
    return errorResponse(code, message);
  }

  playerNotFoundResponse(): WebhookErrorReply {
    return playerNotFoundResponse();
  }

  insufficientFundsResponse(balance: number): WebhookErrorReply {
    return insufficientFundsResponse(balance);
  }

  alreadyProcessedResponse(balance: number): WebhookSuccessReply {
    return alreadyProcessedResponse(balance);
  }
}

function decodePayload(payload: SignablePayload): RawWebhookFields {
  const text = typeof payload === 'string' ? payload : payload.toString('utf8');

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError(
      `Invalid JSON payload: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  if (!isRecord(decoded)) {
    throw new MalformedPayloadError('Webhook payload must be a JSON object');
  }
  return decoded;
}
