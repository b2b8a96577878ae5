export type ConnectionStatus = 'CONNECTED' | 'NOT_CONNECTED';

export type Speaker = 'agent' | 'customer';

export const DISPOSITION_NAMES = [
  'USER_CLAIMED_PAYMENT_WITH_DATE',
  'USER_CLAIMED_PAYMENT',
  'USER_AGREES_TO_MAINTAIN_BALANCE',
  'AGREE_TO_PAY',
  'GENERAL',
  'PAYMENT_DUE_REMINDER',
  'REFUSED_TO_PAY',
  'RTP_COUNSELLED',
  'HUMAN_HANDOFF_REQUESTED',
  'RAISE_DISPUTE_WITH_DETAIL',
  'USER_BUSY_NOW',
  'NO_RESPONSE',
  'CUSTOMER_HANGUP',
  'DELAY_REASON',
  'UNCERTAIN_PROPENSITY_TO_PAY',
  'ACCEPTABLE_PROMISE_TO_PAY',
  'UNACCEPTABLE_PROMISE_TO_PAY',
  'DO_NOT_CALL',
  'BUSY',
  'FAILED',
  'NO_ANSWER',
] as const;

export type Disposition = (typeof DISPOSITION_NAMES)[number];

/** Connection status a call must have for the disposition to be assigned to it. */
export const DISPOSITION_CONNECTION_MAP: Readonly<Record<Disposition, ConnectionStatus>> = {
  USER_CLAIMED_PAYMENT_WITH_DATE: 'CONNECTED',
  USER_CLAIMED_PAYMENT: 'CONNECTED',
  USER_AGREES_TO_MAINTAIN_BALANCE: 'CONNECTED',
  AGREE_TO_PAY: 'CONNECTED',
  GENERAL: 'CONNECTED',
  PAYMENT_DUE_REMINDER: 'CONNECTED',
  REFUSED_TO_PAY: 'CONNECTED',
  RTP_COUNSELLED: 'CONNECTED',
  HUMAN_HANDOFF_REQUESTED: 'CONNECTED',
  RAISE_DISPUTE_WITH_DETAIL: 'CONNECTED',
  USER_BUSY_NOW: 'CONNECTED',
  NO_RESPONSE: 'CONNECTED',
  CUSTOMER_HANGUP: 'CONNECTED',
  DELAY_REASON: 'CONNECTED',
  UNCERTAIN_PROPENSITY_TO_PAY: 'CONNECTED',
  ACCEPTABLE_PROMISE_TO_PAY: 'CONNECTED',
  UNACCEPTABLE_PROMISE_TO_PAY: 'CONNECTED',
  DO_NOT_CALL: 'CONNECTED',
  BUSY: 'NOT_CONNECTED',
  FAILED: 'NOT_CONNECTED',
  NO_ANSWER: 'NOT_CONNECTED',
};

export const DISPOSITION_LABELS: Readonly<Record<Disposition, string>> = {
  USER_CLAIMED_PAYMENT_WITH_DATE: 'User Claimed Payment with Payment Date',
  USER_CLAIMED_PAYMENT: 'User Claimed Payment',
  USER_AGREES_TO_MAINTAIN_BALANCE: 'User Agrees to Maintain Balance',
  AGREE_TO_PAY: 'Agree To Pay',
  GENERAL: 'General',
  PAYMENT_DUE_REMINDER: 'Payment Due Reminder',
  REFUSED_TO_PAY: 'Refused to Pay',
  RTP_COUNSELLED: 'RTP - Counselled',
  HUMAN_HANDOFF_REQUESTED: 'Human Handoff Requested',
  RAISE_DISPUTE_WITH_DETAIL: 'Raise Dispute with Detail',
  USER_BUSY_NOW: 'User Busy Now',
  NO_RESPONSE: 'No Response',
  CUSTOMER_HANGUP: 'Customer Hangup',
  DELAY_REASON: 'Delay Reason',
  UNCERTAIN_PROPENSITY_TO_PAY: 'Uncertain Propensity to Pay',
  ACCEPTABLE_PROMISE_TO_PAY: 'Acceptable Promise To Pay',
  UNACCEPTABLE_PROMISE_TO_PAY: 'Unacceptable Promise To Pay',
  DO_NOT_CALL: 'Do Not Call - Opted Out',
  BUSY: 'Busy',
  FAILED: 'Failed',
  NO_ANSWER: 'No Answer',
};

export interface TranscriptItem {
  readonly speaker: Speaker;
  readonly text: string;
  readonly timestamp: string;
}

export interface DispositionEvent {
  readonly timestamp: string;
  readonly disposition: Disposition;
}

export interface DispositionSnapshot {
  disposition: Disposition | null;
  connectionStatus: ConnectionStatus | null;
  history: DispositionEvent[];
  transcript: TranscriptItem[];
  callDurationSeconds: number;
}
