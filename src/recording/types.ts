export type RecordingStatus = 'RECORDING' | 'COMPLETED' | 'FAILED';

export interface RecordingJob {
  egressId: string;
  roomName: string;
  callId: string;
  status: RecordingStatus;
  startedAt: Date;
  completedAt: Date | null;
  filePath: string | null;
  fileUrl: string | null;
  fileSize: number | null;
  durationSeconds: number | null;
  format: 'mp4';
}

export type RecordingJobPatch = Partial<
  Pick<RecordingJob, 'completedAt' | 'filePath' | 'fileUrl' | 'fileSize' | 'durationSeconds'>
>;

export function isTerminal(status: RecordingStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}

/**
 * Moves a job to a terminal state. A job that is already terminal is
 * returned as is.
 */
export function applyRecordingTransition(
  job: RecordingJob,
  status: Exclude<RecordingStatus, 'RECORDING'>,
  patch: RecordingJobPatch = {},
): RecordingJob {
  if (isTerminal(job.status)) {
    return job;
  }
  return {
    ...job,
    ...patch,
    status,
    completedAt: patch.completedAt ?? new Date(),
  };
}

export interface RecordingView {
  call_id: string;
  egress_id: string;
  status: RecordingStatus;
  file_path: string | null;
  file_url: string | null;
  file_size: number | null;
  duration_seconds: number | null;
  started_at: string;
  completed_at: string | null;
}

export function toRecordingView(job: RecordingJob): RecordingView {
  return {
    call_id: job.callId,
    egress_id: job.egressId,
    status: job.status,
    file_path: job.filePath,
    file_url: job.fileUrl,
    file_size: job.fileSize,
    duration_seconds: job.durationSeconds,
    started_at: job.startedAt.toISOString(),
    completed_at: job.completedAt ? job.completedAt.toISOString() : null,
  };
}
