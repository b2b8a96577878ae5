import { WebhookReceiver } from 'livekit-server-sdk';
import { SessionManager } from './calls/sessionManager';
import type { CallSettings } from './calls/callSession';
import { loadDispositionRules } from './disposition/rules';
import { env } from './env';
import { log } from './log';
import { BestEffortPersistence, BestEffortRecordingStore } from './persistence/bestEffort';
import { LogPersistenceGateway, LogRecordingStore } from './persistence/logGateway';
import { createPool, ensureSchema, PgPersistenceGateway, PgRecordingStore } from './persistence/pgGateway';
import type { PersistenceGateway, RecordingStore } from './persistence/types';
import { createLiveKitPlatform, LiveKitAgentDispatcher } from './platform/livekitPlatform';
import { RecordingMonitor, type UploadSettings } from './recording/recordingMonitor';
import { closeRedisClient } from './redis/client';
import { buildServer } from './server';
import { S3ObjectStorage } from './storage/objectStorage';

const SHUTDOWN_TIMEOUT_MS = 30_000;

function uploadSettings(): UploadSettings | null {
  if (!env.USE_S3_STORAGE) {
    return null;
  }
  if (!env.S3_BUCKET_NAME) {
    log.warn({ event: 's3_disabled_missing_bucket' }, 'object storage enabled without a bucket, keeping recordings local');
    return null;
  }
  return {
    storage: new S3ObjectStorage({
      bucket: env.S3_BUCKET_NAME,
      region: env.S3_REGION,
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    }),
    prefix: env.S3_RECORDING_PREFIX,
    usePresignedUrls: env.S3_USE_PRESIGNED_URLS,
    presignedUrlTtlSeconds: env.S3_PRESIGNED_URL_TTL_SECONDS,
    deleteLocalAfterUpload: env.DELETE_LOCAL_AFTER_S3,
  };
}

async function main(): Promise<void> {
  const rules = loadDispositionRules(env.DISPOSITION_RULES_PATH);
  const credentials = { url: env.LIVEKIT_URL, apiKey: env.LIVEKIT_API_KEY, apiSecret: env.LIVEKIT_API_SECRET };
  const platform = createLiveKitPlatform(credentials, env.SIP_OUTBOUND_TRUNK_ID);

  let persistence: PersistenceGateway = new LogPersistenceGateway();
  let recordingStore: RecordingStore = new LogRecordingStore();
  const pool = env.DATABASE_URL ? createPool(env.DATABASE_URL) : null;
  if (pool) {
    await ensureSchema(pool);
    persistence = new PgPersistenceGateway(pool);
    recordingStore = new PgRecordingStore(pool);
  }

  const recordings = env.RECORDING_ENABLED
    ? new RecordingMonitor({
        egress: platform.egress,
        store: new BestEffortRecordingStore(recordingStore),
        baseDir: env.RECORDING_BASE_DIR,
        egressOutputDir: env.EGRESS_OUTPUT_DIR,
        pollIntervalMs: env.RECORDING_POLL_INTERVAL_MS,
        upload: uploadSettings(),
      })
    : null;

  const settings: CallSettings = {
    participantJoinTimeoutMs: env.PARTICIPANT_JOIN_TIMEOUT_MS,
    maxDurationSeconds: env.CALL_MAX_DURATION_SECONDS,
    recordingGraceMs: env.RECORDING_FINALIZE_GRACE_MS,
    teardownJoinTimeoutMs: env.TEARDOWN_JOIN_TIMEOUT_MS,
    artifactsDir: env.ARTIFACTS_DIR,
    audioCapture: env.AUDIO_CAPTURE_ENABLED ? { sampleLimit: env.AUDIO_FRAME_SAMPLE_LIMIT } : null,
  };

  const sessionManager = new SessionManager({
    platform,
    dispatcher: new LiveKitAgentDispatcher(credentials, env.AGENT_NAME),
    recordings,
    persistence: new BestEffortPersistence(persistence),
    rules,
    settings,
    sessionStartTimeoutMs: env.SESSION_START_TIMEOUT_MS,
  });

  const webhookVerifier =
    env.LIVEKIT_API_KEY && env.LIVEKIT_API_SECRET
      ? new WebhookReceiver(env.LIVEKIT_API_KEY, env.LIVEKIT_API_SECRET)
      : null;

  const { server, wss } = buildServer({
    sessionManager,
    bridgeToken: env.SESSION_BRIDGE_TOKEN,
    webhookVerifier,
    recordings,
  });

  server.listen(env.PORT, () => {
    log.info({ event: 'server_listening', port: env.PORT, recording: env.RECORDING_ENABLED }, 'server listening');
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ event: 'shutdown_started', signal }, 'shutting down');

    const forceExit = setTimeout(() => {
      log.error({ event: 'shutdown_timeout', timeout_ms: SHUTDOWN_TIMEOUT_MS }, 'shutdown timed out');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref?.();

    server.close();
    await sessionManager.shutdown();
    await recordings?.shutdown();
    for (const client of wss.clients) {
      client.terminate();
    }
    await closeRedisClient();
    await pool?.end();
    log.info({ event: 'shutdown_complete' }, 'shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error({ err: error, event: 'shutdown_failed' }, 'shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error, event: 'startup_failed' }, 'startup failed');
  process.exit(1);
});
