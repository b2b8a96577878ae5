import type { DispositionSnapshot, TranscriptItem } from '../disposition/types';
import { log } from '../log';
import { incPersistenceFailure } from '../metrics';
import type { RecordingJob } from '../recording/types';
import type { PersistenceGateway, RecordingStore } from './types';

async function attempt(
  operation: string,
  context: Record<string, unknown>,
  run: () => Promise<void>,
): Promise<void> {
  try {
    await run();
  } catch (error) {
    incPersistenceFailure(operation);
    log.error({ err: error, event: 'persistence_write_failed', operation, ...context }, 'persistence write failed');
  }
}

/**
 * Wraps a gateway so that no lifecycle write can fail the call. Every error
 * is logged and counted, then dropped.
 */
export class BestEffortPersistence implements PersistenceGateway {
  constructor(private readonly inner: PersistenceGateway) {}

  public recordCallStarted(callId: string, roomName: string, phoneNumber: string): Promise<void> {
    return attempt('call_started', { call_id: callId, room: roomName }, () =>
      this.inner.recordCallStarted(callId, roomName, phoneNumber),
    );
  }

  public recordCallConnected(callId: string): Promise<void> {
    return attempt('call_connected', { call_id: callId }, () => this.inner.recordCallConnected(callId));
  }

  public recordCallCompleted(
    callId: string,
    snapshot: DispositionSnapshot,
    transcript: TranscriptItem[],
    durationSeconds: number,
    recordingUrl: string | null,
  ): Promise<void> {
    return attempt('call_completed', { call_id: callId }, () =>
      this.inner.recordCallCompleted(callId, snapshot, transcript, durationSeconds, recordingUrl),
    );
  }

  public recordCallFailed(callId: string, reason: string, rawStatus: string | null): Promise<void> {
    return attempt('call_failed', { call_id: callId }, () =>
      this.inner.recordCallFailed(callId, reason, rawStatus),
    );
  }
}

export class BestEffortRecordingStore implements RecordingStore {
  constructor(private readonly inner: RecordingStore) {}

  public insert(job: RecordingJob): Promise<void> {
    return attempt('recording_insert', { call_id: job.callId, egress_id: job.egressId }, () =>
      this.inner.insert(job),
    );
  }

  public update(job: RecordingJob): Promise<void> {
    return attempt('recording_update', { call_id: job.callId, egress_id: job.egressId }, () =>
      this.inner.update(job),
    );
  }

  public async findByCallId(callId: string): Promise<RecordingJob | null> {
    try {
      return await this.inner.findByCallId(callId);
    } catch (error) {
      incPersistenceFailure('recording_lookup');
      log.error(
        { err: error, event: 'persistence_read_failed', operation: 'recording_lookup', call_id: callId },
        'persistence read failed',
      );
      return null;
    }
  }
}
