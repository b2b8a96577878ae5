import type { DispositionSnapshot, TranscriptItem } from '../disposition/types';
import type { RecordingJob } from '../recording/types';

/** Lifecycle writes for one customer contact attempt (an interaction). */
export interface PersistenceGateway {
  recordCallStarted(callId: string, roomName: string, phoneNumber: string): Promise<void>;
  recordCallConnected(callId: string): Promise<void>;
  recordCallCompleted(
    callId: string,
    snapshot: DispositionSnapshot,
    transcript: TranscriptItem[],
    durationSeconds: number,
    recordingUrl: string | null,
  ): Promise<void>;
  recordCallFailed(callId: string, reason: string, rawStatus: string | null): Promise<void>;
}

export interface RecordingStore {
  insert(job: RecordingJob): Promise<void>;
  update(job: RecordingJob): Promise<void>;
  /** Most recently started recording for a call. */
  findByCallId(callId: string): Promise<RecordingJob | null>;
}
