import { DISPOSITION_LABELS, type Disposition, type DispositionSnapshot } from '../disposition/types';

export type InteractionOutcome =
  | 'PAYMENT_MADE'
  | 'PAYMENT_PROMISED'
  | 'WILL_CALL_BACK'
  | 'NOT_INTERESTED'
  | 'TRANSFERRED_TO_HUMAN'
  | 'DISPUTE_CLAIM'
  | 'NO_ANSWER'
  | 'HUNG_UP'
  | 'BUSY'
  | 'INVALID_NUMBER';

const OUTCOMES: Readonly<Record<Disposition, InteractionOutcome>> = {
  USER_CLAIMED_PAYMENT_WITH_DATE: 'PAYMENT_MADE',
  USER_CLAIMED_PAYMENT: 'PAYMENT_MADE',
  USER_AGREES_TO_MAINTAIN_BALANCE: 'PAYMENT_PROMISED',
  AGREE_TO_PAY: 'PAYMENT_PROMISED',
  ACCEPTABLE_PROMISE_TO_PAY: 'PAYMENT_PROMISED',
  UNACCEPTABLE_PROMISE_TO_PAY: 'WILL_CALL_BACK',
  REFUSED_TO_PAY: 'NOT_INTERESTED',
  RTP_COUNSELLED: 'NOT_INTERESTED',
  DO_NOT_CALL: 'NOT_INTERESTED',
  HUMAN_HANDOFF_REQUESTED: 'TRANSFERRED_TO_HUMAN',
  RAISE_DISPUTE_WITH_DETAIL: 'DISPUTE_CLAIM',
  USER_BUSY_NOW: 'WILL_CALL_BACK',
  NO_RESPONSE: 'NO_ANSWER',
  CUSTOMER_HANGUP: 'HUNG_UP',
  DELAY_REASON: 'WILL_CALL_BACK',
  UNCERTAIN_PROPENSITY_TO_PAY: 'WILL_CALL_BACK',
  GENERAL: 'WILL_CALL_BACK',
  PAYMENT_DUE_REMINDER: 'WILL_CALL_BACK',
  BUSY: 'BUSY',
  FAILED: 'INVALID_NUMBER',
  NO_ANSWER: 'NO_ANSWER',
};

export function outcomeForDisposition(disposition: Disposition | null): InteractionOutcome {
  return disposition ? OUTCOMES[disposition] : 'WILL_CALL_BACK';
}

export interface CompletionFlags {
  paymentDiscussed: boolean;
  disputeRaised: boolean;
  followUpRequired: boolean;
}

export function completionFlags(disposition: Disposition | null): CompletionFlags {
  if (!disposition) {
    return { paymentDiscussed: false, disputeRaised: false, followUpRequired: false };
  }
  const label = DISPOSITION_LABELS[disposition].toLowerCase();
  return {
    paymentDiscussed: ['payment', 'pay', 'paid', 'emi'].some((keyword) => label.includes(keyword)),
    disputeRaised: label.includes('dispute'),
    followUpRequired: ['promise', 'will call', 'busy', 'uncertain'].some((keyword) =>
      label.includes(keyword),
    ),
  };
}

export function completionNotes(snapshot: DispositionSnapshot, durationSeconds: number, at: Date): string {
  const label = snapshot.disposition ? DISPOSITION_LABELS[snapshot.disposition] : 'None';
  return [
    `DISPOSITION: ${label}`,
    `CONNECTION_STATUS: ${snapshot.connectionStatus ?? 'UNKNOWN'}`,
    `CALL_DURATION: ${durationSeconds} seconds`,
    `DISPOSITION_TIME: ${at.toISOString()}`,
  ].join('\n');
}

export function failureNotes(reason: string, rawStatus: string | null, at: Date): string {
  return [
    `DISPOSITION: ${reason}`,
    'CONNECTION_STATUS: NOT_CONNECTED',
    `SIP_STATUS: ${rawStatus ?? 'Unknown'}`,
    `FAILED_AT: ${at.toISOString()}`,
  ].join('\n');
}
