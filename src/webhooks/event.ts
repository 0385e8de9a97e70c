import {
  WebhookEventTypes,
  type RawWebhookFields,
  type WebhookEventFields,
  type WebhookEventType,
} from '../types/webhook.types';

/**
 * A normalized inbound webhook. Built once per request by
 * {@link WebhookHandler.parse} and frozen on construction.
 */
export class WebhookEvent implements WebhookEventFields {
  readonly eventType: WebhookEventType;
  readonly playerId: string;
  readonly currency: string;
  readonly timestamp: string;
  readonly gameId?: number;
  readonly gameType: string;
  readonly transactionId?: number;
  readonly amountMinorUnits?: number;
  readonly sessionId: string;
  readonly roundId: string;
  readonly rewardType: string;
  readonly rewardTitle: string;
  readonly isFreespin: boolean;
  readonly freespinId: string;
  readonly freespinTotal?: number;
  readonly freespinsRemaining?: number;
  readonly freespinRoundNumber?: number;
  readonly freespinTotalWinnings?: number;
  readonly rawFields: RawWebhookFields;

  constructor(fields: WebhookEventFields) {
    this.eventType = fields.eventType;
    this.playerId = fields.playerId;
    this.currency = fields.currency;
    this.timestamp = fields.timestamp;
    this.gameId = fields.gameId;
    this.gameType = fields.gameType;
    this.transactionId = fields.transactionId;
    this.amountMinorUnits = fields.amountMinorUnits;
    this.sessionId = fields.sessionId;
    this.roundId = fields.roundId;
    this.rewardType = fields.rewardType;
    this.rewardTitle = fields.rewardTitle;
    this.isFreespin = fields.isFreespin;
    this.freespinId = fields.freespinId;
    this.freespinTotal = fields.freespinTotal;
    this.freespinsRemaining = fields.freespinsRemaining;
    this.freespinRoundNumber = fields.freespinRoundNumber;
    this.freespinTotalWinnings = fields.freespinTotalWinnings;
    this.rawFields = Object.freeze({ ...fields.rawFields });
    Object.freeze(this);
  }

  isAuthenticate(): boolean {
    return this.eventType === WebhookEventTypes.AUTHENTICATE;
  }

  isBalanceCheck(): boolean {
    return this.eventType === WebhookEventTypes.BALANCE_CHECK;
  }

  isBet(): boolean {
    return this.eventType === WebhookEventTypes.BET;
  }

  isWin(): boolean {
    return this.eventType === WebhookEventTypes.WIN;
  }

  isRollback(): boolean {
    return this.eventType === WebhookEventTypes.ROLLBACK;
  }

  isReward(): boolean {
    return this.eventType === WebhookEventTypes.REWARD;
  }

  /** The only place minor units are scaled to major units. */
  amountInMajorUnits(): number | undefined {
    if (this.amountMinorUnits === undefined) {
      return undefined;
    }
    return this.amountMinorUnits / 100;
  }

  /** Reads a field the event does not model. */
  get(key: string): unknown {
    return this.rawFields[key];
  }
}
