import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { z } from 'zod';
import type { DispositionSnapshot, TranscriptItem } from '../disposition/types';
import { DISPOSITION_LABELS } from '../disposition/types';
import { log } from '../log';
import type { RecordingJob, RecordingStatus } from '../recording/types';
import { completionFlags, completionNotes, failureNotes, outcomeForDisposition } from './outcome';
import type { PersistenceGateway, RecordingStore } from './types';

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(connectionString: string): Pool {
  const pool = new Pool({ connectionString, max: 10 });
  pool.on('error', (error) => {
    log.error({ err: error, event: 'pg_pool_error' }, 'unexpected postgres pool error');
  });
  return pool;
}

export async function ensureSchema(db: Queryable, schemaPath = 'sql/schema.sql'): Promise<void> {
  const sql = await fs.promises.readFile(path.resolve(process.cwd(), schemaPath), 'utf8');
  await db.query(sql);
  log.info({ event: 'pg_schema_ready' }, 'postgres schema ready');
}

const FAILURE_OUTCOMES: Record<string, string> = {
  [DISPOSITION_LABELS.BUSY]: 'BUSY',
  [DISPOSITION_LABELS.NO_ANSWER]: 'NO_ANSWER',
  [DISPOSITION_LABELS.FAILED]: 'INVALID_NUMBER',
};

export class PgPersistenceGateway implements PersistenceGateway {
  constructor(
    private readonly db: Queryable,
    private readonly now: () => Date = () => new Date(),
  ) {}

  public async recordCallStarted(callId: string, roomName: string, phoneNumber: string): Promise<void> {
    const callDisposition = {
      room_name: roomName,
      phone_number: phoneNumber,
      dial_started_at: this.now().toISOString(),
    };
    await this.db.query(
      `INSERT INTO interactions (id, status, "startTime", "callDisposition", "createdAt", "updatedAt")
       VALUES ($1, 'IN_PROGRESS', NOW(), CAST($2 AS jsonb), NOW(), NOW())
       ON CONFLICT (id) DO UPDATE SET
         status = 'IN_PROGRESS',
         "startTime" = NOW(),
         "callDisposition" = CAST($2 AS jsonb),
         "updatedAt" = NOW()`,
      [callId, JSON.stringify(callDisposition)],
    );
    log.info({ event: 'interaction_call_started', call_id: callId }, 'interaction updated - call started');
  }

  public async recordCallConnected(callId: string): Promise<void> {
    await this.db.query(
      `UPDATE interactions
       SET
         "rightPartyVerified" = true,
         "connectionStability" = 1.0,
         "updatedAt" = NOW(),
         "callDisposition" = jsonb_set(COALESCE("callDisposition", '{}'::jsonb), '{connected_at}', to_jsonb($2::text))
       WHERE id = $1`,
      [callId, this.now().toISOString()],
    );
    log.info({ event: 'interaction_call_connected', call_id: callId }, 'interaction updated - call connected');
  }

  public async recordCallCompleted(
    callId: string,
    snapshot: DispositionSnapshot,
    transcript: TranscriptItem[],
    durationSeconds: number,
    recordingUrl: string | null,
  ): Promise<void> {
    const at = this.now();
    const duration = Math.round(durationSeconds);
    const flags = completionFlags(snapshot.disposition);
    const label = snapshot.disposition ? DISPOSITION_LABELS[snapshot.disposition] : null;
    const callDisposition = {
      completed_at: at.toISOString(),
      final_disposition: label,
      connection_status: snapshot.connectionStatus,
      disposition_history: snapshot.history,
      duration_seconds: duration,
    };

    await this.db.query(
      `UPDATE interactions
       SET
         status = 'COMPLETED',
         outcome = $2,
         "endTime" = NOW(),
         duration = $3,
         transcript = CAST($4 AS jsonb),
         recording = $5,
         notes = $6,
         "callDisposition" = COALESCE("callDisposition", '{}'::jsonb) || CAST($7 AS jsonb),
         "paymentDiscussed" = $8,
         "disputeRaised" = $9,
         "followUpRequired" = $10,
         "updatedAt" = NOW()
       WHERE id = $1`,
      [
        callId,
        outcomeForDisposition(snapshot.disposition),
        duration,
        JSON.stringify(transcript),
        recordingUrl,
        completionNotes(snapshot, duration, at),
        JSON.stringify(callDisposition),
        flags.paymentDiscussed,
        flags.disputeRaised,
        flags.followUpRequired,
      ],
    );
    log.info(
      { event: 'interaction_call_completed', call_id: callId, disposition: label },
      'interaction updated - call completed',
    );
  }

  public async recordCallFailed(callId: string, reason: string, rawStatus: string | null): Promise<void> {
    const at = this.now();
    const callDisposition = {
      failed_at: at.toISOString(),
      failure_reason: reason,
      sip_status: rawStatus,
    };
    await this.db.query(
      `UPDATE interactions
       SET
         status = 'FAILED',
         outcome = $2,
         "endTime" = NOW(),
         duration = 0,
         notes = $3,
         "callDisposition" = COALESCE("callDisposition", '{}'::jsonb) || CAST($4 AS jsonb),
         "updatedAt" = NOW()
       WHERE id = $1`,
      [
        callId,
        FAILURE_OUTCOMES[reason] ?? 'INVALID_NUMBER',
        failureNotes(reason, rawStatus, at),
        JSON.stringify(callDisposition),
      ],
    );
    log.info({ event: 'interaction_call_failed', call_id: callId, reason }, 'interaction updated - call failed');
  }
}

const STORED_RECORDING_STATUS: Record<'recording' | 'completed' | 'failed', RecordingStatus> = {
  recording: 'RECORDING',
  completed: 'COMPLETED',
  failed: 'FAILED',
};

const RecordingRowSchema = z.object({
  call_id: z.string(),
  egress_id: z.string(),
  room_name: z.string(),
  status: z.enum(['recording', 'completed', 'failed']),
  started_at: z.coerce.date(),
  completed_at: z.coerce.date().nullable(),
  file_path: z.string().nullable(),
  file_url: z.string().nullable(),
  // BIGINT comes back as a string.
  file_size: z.coerce.number().nullable(),
  duration_seconds: z.number().nullable(),
  format: z.literal('mp4'),
});

export class PgRecordingStore implements RecordingStore {
  constructor(private readonly db: Queryable) {}

  public async insert(job: RecordingJob): Promise<void> {
    await this.db.query(
      `INSERT INTO call_recordings (call_id, egress_id, room_name, status, started_at, format)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [job.callId, job.egressId, job.roomName, job.status.toLowerCase(), job.startedAt, job.format],
    );
  }

  public async update(job: RecordingJob): Promise<void> {
    await this.db.query(
      `UPDATE call_recordings
       SET status = $2, completed_at = $3, file_path = $4, file_url = $5, file_size = $6, duration_seconds = $7
       WHERE egress_id = $1`,
      [
        job.egressId,
        job.status.toLowerCase(),
        job.completedAt,
        job.filePath,
        job.fileUrl,
        job.fileSize,
        job.durationSeconds,
      ],
    );
  }

  public async findByCallId(callId: string): Promise<RecordingJob | null> {
    const result = await this.db.query(
      `SELECT call_id, egress_id, room_name, status, started_at, completed_at,
              file_path, file_url, file_size, duration_seconds, format
       FROM call_recordings
       WHERE call_id = $1
       ORDER BY started_at DESC
       LIMIT 1`,
      [callId],
    );
    if (result.rows.length === 0) {
      return null;
    }
    const row = RecordingRowSchema.parse(result.rows[0]);
    return {
      egressId: row.egress_id,
      roomName: row.room_name,
      callId: row.call_id,
      status: STORED_RECORDING_STATUS[row.status],
      startedAt: row.started_at,
      completedAt: row.completed_at,
      filePath: row.file_path,
      fileUrl: row.file_url,
      fileSize: row.file_size,
      durationSeconds: row.duration_seconds,
      format: row.format,
    };
  }
}
