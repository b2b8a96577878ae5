import { promises as fs } from 'fs';
import path from 'path';
import { log } from '../log';
import { incRecordingOutcome } from '../metrics';
import type { RecordingStore } from '../persistence/types';
import type { EgressService, EgressSnapshot } from '../platform/types';
import type { ObjectStorage } from '../storage/objectStorage';
import { datePathSegments, epochSeconds, errnoCode, moveFile, sanitizeSegment } from '../storage/paths';
import { applyRecordingTransition, isTerminal, type RecordingJob, type RecordingJobPatch } from './types';

export interface UploadSettings {
  storage: ObjectStorage;
  prefix: string;
  usePresignedUrls: boolean;
  presignedUrlTtlSeconds: number;
  deleteLocalAfterUpload: boolean;
}

export interface RecordingMonitorOptions {
  egress: EgressService;
  store: RecordingStore;
  baseDir: string;
  egressOutputDir: string;
  pollIntervalMs: number;
  upload?: UploadSettings | null;
  /** Bound on waiting for a cancelled loop's in-flight poll. */
  settleTimeoutMs?: number;
  now?: () => Date;
}

const DEFAULT_SETTLE_TIMEOUT_MS = 5000;

/** Resolves true if `done` settles within `ms`, false otherwise. */
async function settleWithin(done: Promise<void>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'expired'>((resolve) => {
    timer = setTimeout(() => resolve('expired'), ms);
  });
  const result = await Promise.race([done.then(() => 'settled' as const), expired]);
  if (timer) {
    clearTimeout(timer);
  }
  return result === 'settled';
}

interface MonitorEntry {
  job: RecordingJob;
  controller: AbortController;
  wakeRequested: boolean;
  wake: (() => void) | null;
  done: Promise<void>;
}

/**
 * Starts one egress per connected call and follows it to a terminal state.
 * Each job gets its own poll loop, tracked so that teardown can hurry it
 * along and shutdown can cancel it.
 */
export class RecordingMonitor {
  private readonly entries = new Map<string, MonitorEntry>();
  private readonly now: () => Date;
  private readonly settleTimeoutMs: number;

  constructor(private readonly options: RecordingMonitorOptions) {
    this.now = options.now ?? (() => new Date());
    this.settleTimeoutMs = options.settleTimeoutMs ?? DEFAULT_SETTLE_TIMEOUT_MS;
  }

  public async start(roomName: string, callId: string): Promise<string | null> {
    const startedAt = this.now();
    const outputPath = path.join(
      this.options.egressOutputDir,
      `${sanitizeSegment(roomName)}_${epochSeconds(startedAt)}.mp4`,
    );

    try {
      const egressId = await this.options.egress.startRoomAudioRecording(roomName, outputPath);
      const job: RecordingJob = {
        egressId,
        roomName,
        callId,
        status: 'RECORDING',
        startedAt,
        completedAt: null,
        filePath: null,
        fileUrl: null,
        fileSize: null,
        durationSeconds: null,
        format: 'mp4',
      };
      await this.options.store.insert(job);

      const entry: MonitorEntry = {
        job,
        controller: new AbortController(),
        wakeRequested: false,
        wake: null,
        done: Promise.resolve(),
      };
      entry.done = this.runLoop(entry).catch((error: unknown) => {
        log.error(
          { err: error, event: 'recording_monitor_crashed', call_id: callId, egress_id: egressId },
          'recording monitor loop crashed',
        );
      });
      this.entries.set(egressId, entry);

      incRecordingOutcome('started');
      log.info(
        { event: 'recording_started', call_id: callId, room: roomName, egress_id: egressId, output: outputPath },
        'recording started',
      );
      return egressId;
    } catch (error) {
      incRecordingOutcome('start_failed');
      log.error({ err: error, event: 'recording_start_failed', call_id: callId, room: roomName }, 'recording start failed');
      return null;
    }
  }

  public async stop(egressId: string): Promise<void> {
    try {
      await this.options.egress.stopRecording(egressId);
      log.info({ event: 'recording_stop_requested', egress_id: egressId }, 'recording stop requested');
    } catch (error) {
      log.warn({ err: error, event: 'recording_stop_failed', egress_id: egressId }, 'recording stop failed');
    }
  }

  public getJob(egressId: string): RecordingJob | null {
    return this.entries.get(egressId)?.job ?? null;
  }

  /**
   * Latest known job for a call: the live one when a loop is still
   * following it, otherwise the stored row.
   */
  public async getRecordingInfo(callId: string): Promise<RecordingJob | null> {
    let live: RecordingJob | null = null;
    for (const entry of this.entries.values()) {
      if (entry.job.callId === callId && (!live || entry.job.startedAt >= live.startedAt)) {
        live = entry.job;
      }
    }
    return live ?? this.options.store.findByCallId(callId);
  }

  /**
   * Polls immediately, waits up to `graceMs` for the job to settle, then
   * cancels its loop. Returns the last known job state. A poll still in
   * flight after cancellation is left to finish and write the row on its own.
   */
  public async finalize(egressId: string, graceMs: number): Promise<RecordingJob | null> {
    const entry = this.entries.get(egressId);
    if (!entry) {
      return null;
    }

    if (!isTerminal(entry.job.status)) {
      this.wakeLoop(entry);
      await settleWithin(entry.done, graceMs);
    }

    entry.controller.abort();
    this.entries.delete(egressId);
    const settled = await settleWithin(entry.done, this.settleTimeoutMs);

    if (!settled) {
      log.warn(
        {
          event: 'recording_finalize_abandoned',
          call_id: entry.job.callId,
          egress_id: egressId,
          timeout_ms: this.settleTimeoutMs,
        },
        'recording poll still in flight, not waiting for it',
      );
    } else if (!isTerminal(entry.job.status)) {
      log.warn(
        { event: 'recording_finalize_timeout', call_id: entry.job.callId, egress_id: egressId, grace_ms: graceMs },
        'recording did not settle within grace period',
      );
    }
    return entry.job;
  }

  public async shutdown(): Promise<void> {
    const entries = Array.from(this.entries.values());
    this.entries.clear();
    for (const entry of entries) {
      entry.controller.abort();
    }
    const settled = await settleWithin(
      Promise.all(entries.map((entry) => entry.done)).then(() => undefined),
      this.settleTimeoutMs,
    );
    if (!settled) {
      log.warn(
        { event: 'recording_shutdown_timeout', timeout_ms: this.settleTimeoutMs },
        'recording polls still in flight at shutdown',
      );
    }
  }

  private wakeLoop(entry: MonitorEntry): void {
    entry.wakeRequested = true;
    entry.wake?.();
  }

  private async runLoop(entry: MonitorEntry): Promise<void> {
    const signal = entry.controller.signal;
    while (!signal.aborted) {
      await this.sleep(entry);
      if (signal.aborted) {
        return;
      }
      if (await this.poll(entry)) {
        return;
      }
    }
  }

  private sleep(entry: MonitorEntry): Promise<void> {
    if (entry.wakeRequested) {
      entry.wakeRequested = false;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const signal = entry.controller.signal;
      let timer: NodeJS.Timeout | undefined;
      const finish = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        signal.removeEventListener('abort', finish);
        entry.wake = null;
        entry.wakeRequested = false;
        resolve();
      };
      timer = setTimeout(finish, this.options.pollIntervalMs);
      entry.wake = finish;
      signal.addEventListener('abort', finish, { once: true });
    });
  }

  /** Returns true once the job has reached a terminal state. */
  private async poll(entry: MonitorEntry): Promise<boolean> {
    const { callId, egressId } = entry.job;
    let snapshot: EgressSnapshot | null;
    try {
      snapshot = await this.options.egress.getRecording(egressId);
    } catch (error) {
      log.warn({ err: error, event: 'recording_poll_failed', call_id: callId, egress_id: egressId }, 'recording poll failed');
      return false;
    }

    if (!snapshot) {
      log.warn({ event: 'recording_not_found', call_id: callId, egress_id: egressId }, 'egress not found');
      await this.fail(entry);
      return true;
    }

    switch (snapshot.state) {
      case 'active':
        return false;
      case 'failed':
        log.error(
          { event: 'recording_failed', call_id: callId, egress_id: egressId, error: snapshot.error },
          'recording failed',
        );
        await this.fail(entry);
        return true;
      case 'complete':
        await this.complete(entry, snapshot);
        return true;
    }
  }

  private async fail(entry: MonitorEntry): Promise<void> {
    entry.job = applyRecordingTransition(entry.job, 'FAILED', { completedAt: this.now() });
    await this.options.store.update(entry.job);
    incRecordingOutcome('failed');
  }

  private async complete(entry: MonitorEntry, snapshot: EgressSnapshot): Promise<void> {
    const job = entry.job;
    const fileName = `${sanitizeSegment(job.callId)}_${sanitizeSegment(job.egressId)}.mp4`;
    const dateSegments = datePathSegments(job.startedAt);

    const patch: RecordingJobPatch = {
      completedAt: this.now(),
      durationSeconds: snapshot.durationSeconds ?? null,
    };

    const localPath = snapshot.filename
      ? await this.organize(snapshot.filename, path.join(this.options.baseDir, ...dateSegments), fileName, job)
      : null;

    if (localPath) {
      patch.filePath = localPath;
      patch.fileSize = await this.fileSize(localPath, job);
      const upload = this.options.upload;
      if (upload) {
        const key = [upload.prefix, ...dateSegments, fileName].join('/');
        patch.fileUrl = await this.upload(upload, localPath, key, job);
        if (patch.fileUrl && upload.deleteLocalAfterUpload) {
          await this.removeLocal(localPath, job);
        }
      }
    }

    entry.job = applyRecordingTransition(job, 'COMPLETED', patch);
    await this.options.store.update(entry.job);
    incRecordingOutcome('completed');
    log.info(
      {
        event: 'recording_completed',
        call_id: job.callId,
        egress_id: job.egressId,
        file_path: entry.job.filePath,
        file_url: entry.job.fileUrl,
        file_size: entry.job.fileSize,
        duration_seconds: entry.job.durationSeconds,
      },
      'recording completed',
    );
  }

  private async organize(
    source: string,
    targetDir: string,
    fileName: string,
    job: RecordingJob,
  ): Promise<string | null> {
    const target = path.join(targetDir, fileName);
    try {
      await fs.mkdir(targetDir, { recursive: true });
      await moveFile(source, target);
      log.info({ event: 'recording_file_moved', call_id: job.callId, from: source, to: target }, 'recording file moved');
      return target;
    } catch (error) {
      const missing = errnoCode(error) === 'ENOENT';
      log.warn(
        { err: error, event: 'recording_file_unavailable', call_id: job.callId, source, missing },
        'recording file could not be organized',
      );
      return null;
    }
  }

  private async fileSize(filePath: string, job: RecordingJob): Promise<number | null> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error) {
      log.warn({ err: error, event: 'recording_stat_failed', call_id: job.callId, file_path: filePath }, 'recording stat failed');
      return null;
    }
  }

  private async upload(
    settings: UploadSettings,
    localPath: string,
    key: string,
    job: RecordingJob,
  ): Promise<string | null> {
    try {
      await settings.storage.upload(localPath, key, 'video/mp4');
      return settings.usePresignedUrls
        ? await settings.storage.presignedUrl(key, settings.presignedUrlTtlSeconds)
        : settings.storage.publicUrl(key);
    } catch (error) {
      log.error(
        { err: error, event: 'recording_upload_failed', call_id: job.callId, egress_id: job.egressId, key },
        'recording upload failed, keeping local file',
      );
      return null;
    }
  }

  private async removeLocal(localPath: string, job: RecordingJob): Promise<void> {
    try {
      await fs.unlink(localPath);
      log.info({ event: 'recording_local_deleted', call_id: job.callId, file_path: localPath }, 'deleted local recording after upload');
    } catch (error) {
      log.warn({ err: error, event: 'recording_local_delete_failed', call_id: job.callId, file_path: localPath }, 'local recording delete failed');
    }
  }
}
