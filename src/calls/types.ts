import { z } from 'zod';

export type CallSessionId = string;

export type CallState = 'INITIATED' | 'DIALING' | 'CONNECTED' | 'IN_PROGRESS' | 'COMPLETED' | 'FAILED';

export type TeardownReason =
  | 'dial_failed'
  | 'timeout'
  | 'end_call'
  | 'voicemail'
  | 'platform_closed'
  | 'transfer_failed'
  | 'participant_join_failed'
  | 'session_start_failed'
  | 'shutdown';

export const CustomerInfoSchema = z.object({
  customer_name: z.string().min(1).default('Customer'),
  last_4_digits: z.string().min(1).default('0000'),
  emi_amount: z.number().nonnegative().default(1500),
  days_past_due: z.number().int().nonnegative().default(30),
  total_balance: z.number().nonnegative().optional(),
  late_fee: z.number().nonnegative().optional(),
  apr: z.number().nonnegative().optional(),
});

export type CustomerInfo = z.infer<typeof CustomerInfoSchema>;

export const DialRequestBodySchema = z.object({
  phone_number: z.string().trim().regex(/^\+?[0-9][0-9 ()-]{5,}$/, 'phone_number must be a dialable number'),
  from_number: z.string().trim().min(1).optional(),
  transfer_to: z.string().trim().min(1).optional(),
  interaction_id: z.string().trim().min(1).optional(),
  customer_info: CustomerInfoSchema.optional(),
});

export type DialRequestBody = z.infer<typeof DialRequestBodySchema>;

/** Everything a controller needs to place and run one call. */
export interface DialInfo {
  phoneNumber: string;
  fromNumber?: string;
  transferTo?: string;
  customerInfo: CustomerInfo;
}

export function toDialInfo(body: DialRequestBody): DialInfo {
  return {
    phoneNumber: body.phone_number.replace(/[ ()-]/g, ''),
    fromNumber: body.from_number,
    transferTo: body.transfer_to,
    customerInfo: body.customer_info ?? CustomerInfoSchema.parse({}),
  };
}

export function balanceSummary(info: CustomerInfo): string {
  const totalBalance = info.total_balance ?? 47250;
  const lateFee = info.late_fee ?? 250;
  const apr = info.apr ?? 8.75;
  return `Total balance: $${totalBalance}. Past due monthly payment: $${info.emi_amount}. Late fee: $${lateFee}. APR: ${apr}%`;
}

export interface CallStatusView {
  call_id: CallSessionId;
  room_name: string;
  state: CallState;
  connection_status: string | null;
  disposition: string | null;
  started_at: string;
  recording: { egress_id: string; status: string; file_url: string | null } | null;
}
