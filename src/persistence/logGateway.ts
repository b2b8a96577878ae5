import type { DispositionSnapshot, TranscriptItem } from '../disposition/types';
import { log } from '../log';
import type { RecordingJob } from '../recording/types';
import type { PersistenceGateway, RecordingStore } from './types';

/** Used when no database is configured: lifecycle events only reach the log. */
export class LogPersistenceGateway implements PersistenceGateway {
  public async recordCallStarted(callId: string, roomName: string, phoneNumber: string): Promise<void> {
    log.info({ event: 'call_started', call_id: callId, room: roomName, phone: phoneNumber }, 'call started');
  }

  public async recordCallConnected(callId: string): Promise<void> {
    log.info({ event: 'call_connected', call_id: callId }, 'call connected');
  }

  public async recordCallCompleted(
    callId: string,
    snapshot: DispositionSnapshot,
    transcript: TranscriptItem[],
    durationSeconds: number,
    recordingUrl: string | null,
  ): Promise<void> {
    log.info(
      {
        event: 'call_completed',
        call_id: callId,
        disposition: snapshot.disposition,
        connection_status: snapshot.connectionStatus,
        transcript_items: transcript.length,
        duration_seconds: durationSeconds,
        recording_url: recordingUrl,
      },
      'call completed',
    );
  }

  public async recordCallFailed(callId: string, reason: string, rawStatus: string | null): Promise<void> {
    log.info({ event: 'call_failed', call_id: callId, reason, raw_status: rawStatus }, 'call failed');
  }
}

export class LogRecordingStore implements RecordingStore {
  public async insert(job: RecordingJob): Promise<void> {
    log.info(
      { event: 'recording_row_inserted', call_id: job.callId, egress_id: job.egressId },
      'recording row inserted',
    );
  }

  public async update(job: RecordingJob): Promise<void> {
    log.info(
      {
        event: 'recording_row_updated',
        call_id: job.callId,
        egress_id: job.egressId,
        status: job.status,
        file_path: job.filePath,
        file_url: job.fileUrl,
      },
      'recording row updated',
    );
  }

  public async findByCallId(): Promise<RecordingJob | null> {
    return null;
  }
}
