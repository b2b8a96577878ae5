import { z } from 'zod';

export const TOOL_NAMES = [
  'end_call',
  'transfer_call',
  'detected_answering_machine',
  'opt_out',
  'check_account_balance',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isKnownTool(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

const UserInputTranscribedSchema = z.object({
  type: z.literal('user_input_transcribed'),
  transcript: z.string(),
  is_final: z.boolean().default(true),
});

const ConversationItemAddedSchema = z.object({
  type: z.literal('conversation_item_added'),
  role: z.enum(['assistant', 'user', 'system']),
  text: z.string(),
});

const ToolCallSchema = z.object({
  type: z.literal('tool_call'),
  id: z.string().min(1),
  // Unknown names still parse so the agent gets a tool_result back.
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
});

const AckSchema = z.object({
  type: z.literal('ack'),
  id: z.string().min(1),
  ok: z.boolean().default(true),
  error: z.string().optional(),
});

const CloseSchema = z.object({
  type: z.literal('close'),
  reason: z.string().optional(),
});

export const SessionEventSchema = z.discriminatedUnion('type', [
  UserInputTranscribedSchema,
  ConversationItemAddedSchema,
  ToolCallSchema,
  AckSchema,
  CloseSchema,
]);

export type SessionEvent = z.infer<typeof SessionEventSchema>;
export type ToolCallEvent = z.infer<typeof ToolCallSchema>;
export type AckEvent = z.infer<typeof AckSchema>;

export type BridgeCommand =
  | { type: 'say'; id: string; instructions: string }
  | { type: 'wait_playout'; id: string }
  | { type: 'tool_result'; id: string; output: string };

export function parseSessionEvent(raw: string): SessionEvent | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = SessionEventSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
