export const WebhookEventTypes = {
  AUTHENTICATE: 'authenticate',
  BALANCE_CHECK: 'balance_check',
  BET: 'bet',
  WIN: 'win',
  ROLLBACK: 'rollback',
  REWARD: 'reward',
} as const;

export type KnownWebhookEventType = (typeof WebhookEventTypes)[keyof typeof WebhookEventTypes];

// Unrecognized tags pass through untouched.
export type WebhookEventType = KnownWebhookEventType | (string & {});

export type RawWebhookFields = Readonly<Record<string, unknown>>;

export interface WebhookEventFields {
  eventType: WebhookEventType;
  playerId: string;
  currency: string;
  timestamp: string;
  gameId?: number;
  gameType: string;
  transactionId?: number;
  /** Amount in minor currency units (cents). */
  amountMinorUnits?: number;
  sessionId: string;
  roundId: string;
  rewardType: string;
  rewardTitle: string;
  isFreespin: boolean;
  freespinId: string;
  freespinTotal?: number;
  freespinsRemaining?: number;
  freespinRoundNumber?: number;
  freespinTotalWinnings?: number;
  rawFields: RawWebhookFields;
}

export type WebhookReplyValue = string | number | boolean | null;

export interface WebhookSuccessReply {
  status: 'success';
  balance: number;
  [key: string]: WebhookReplyValue;
}

export interface WebhookErrorReply {
  status: 'error';
  error_code: string;
  error_message: string;
  balance?: number;
  [key: string]: WebhookReplyValue | undefined;
}

export type WebhookReply = WebhookSuccessReply | WebhookErrorReply;

export type WebhookReplyExtras = Record<string, WebhookReplyValue>;
