import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LIVEKIT_URL: z.string().min(1),
  LIVEKIT_API_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  LIVEKIT_API_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  SIP_OUTBOUND_TRUNK_ID: z.string().min(1),
  AGENT_NAME: z.preprocess(emptyToUndefined, z.string().min(1).default('outbound-caller')),
  SESSION_BRIDGE_TOKEN: z.string().min(1),
  SESSION_START_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(15000),
  ),
  PARTICIPANT_JOIN_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(10000),
  ),
  CALL_MAX_DURATION_SECONDS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(180),
  ),
  TEARDOWN_JOIN_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(5000),
  ),
  DISPOSITION_RULES_PATH: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('config/disposition-rules.json'),
  ),
  RECORDING_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),
  RECORDING_BASE_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('recordings')),
  EGRESS_OUTPUT_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('/out')),
  RECORDING_POLL_INTERVAL_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(5000),
  ),
  RECORDING_FINALIZE_GRACE_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(30000),
  ),
  USE_S3_STORAGE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  S3_BUCKET_NAME: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  S3_REGION: z.preprocess(emptyToUndefined, z.string().min(1).default('us-east-1')),
  AWS_ACCESS_KEY_ID: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  AWS_SECRET_ACCESS_KEY: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  S3_RECORDING_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('call-recordings')),
  S3_USE_PRESIGNED_URLS: z.preprocess(stringToBoolean, z.boolean().default(true)),
  S3_PRESIGNED_URL_TTL_SECONDS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(604800),
  ),
  DELETE_LOCAL_AFTER_S3: z.preprocess(stringToBoolean, z.boolean().default(true)),
  ARTIFACTS_DIR: z.preprocess(emptyToUndefined, z.string().min(1).default('call-artifacts')),
  AUDIO_CAPTURE_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(false)),
  AUDIO_FRAME_SAMPLE_LIMIT: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().default(100),
  ),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  REDIS_URL: z.string().min(1),
  GLOBAL_CONCURRENCY_CAP: z.coerce.number().int().positive(),
  CAPACITY_TTL_SECONDS: z.coerce.number().int().positive(),
  CAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('cap')),
});

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;

export type Env = typeof env;
