import assert from 'node:assert/strict';
import { existsSync, promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

import type { RecordingJob } from '../src/recording/types';
import type { EgressSnapshot, EgressService } from '../src/platform/types';
import type { ObjectStorage } from '../src/storage/objectStorage';

const STARTED_AT = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

async function waitFor(predicate: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 200; attempt += 1) {
    if (predicate()) return;
    await new Promise((resolve) => setTimeout(resolve, 2));
  }
  throw new Error('condition not met');
}

class FakeEgress implements EgressService {
  public started: Array<{ roomName: string; filepath: string }> = [];
  public stopped: string[] = [];
  public snapshot: EgressSnapshot | null = { egressId: 'EG_1', state: 'active' };
  public failStart = false;
  public polls = 0;
  public pollGate: Promise<void> | null = null;

  async startRoomAudioRecording(roomName: string, filepath: string): Promise<string> {
    if (this.failStart) {
      throw new Error('missing credentials');
    }
    this.started.push({ roomName, filepath });
    return 'EG_1';
  }

  async stopRecording(egressId: string): Promise<void> {
    this.stopped.push(egressId);
  }

  async getRecording(): Promise<EgressSnapshot | null> {
    this.polls += 1;
    if (this.pollGate) {
      await this.pollGate;
    }
    return this.snapshot;
  }
}

class FakeStore {
  public inserted: RecordingJob[] = [];
  public updated: RecordingJob[] = [];

  async insert(job: RecordingJob): Promise<void> {
    this.inserted.push({ ...job });
  }

  async update(job: RecordingJob): Promise<void> {
    this.updated.push({ ...job });
  }

  async findByCallId(callId: string): Promise<RecordingJob | null> {
    const rows = this.updated.filter((job) => job.callId === callId);
    return rows.length > 0 ? rows[rows.length - 1] : null;
  }
}

class FakeStorage implements ObjectStorage {
  public uploads: Array<{ localPath: string; key: string; contentType: string; existed: boolean }> = [];
  public fail = false;

  async upload(localPath: string, key: string, contentType: string): Promise<void> {
    this.uploads.push({ localPath, key, contentType, existed: existsSync(localPath) });
    if (this.fail) {
      throw new Error('access denied');
    }
  }

  async presignedUrl(key: string, ttlSeconds: number): Promise<string> {
    return `https://storage.test/${key}?ttl=${ttlSeconds}`;
  }

  publicUrl(key: string): string {
    return `https://storage.test/${key}`;
  }
}

async function setup(options: { withStorage?: boolean; settleTimeoutMs?: number } = {}) {
  const { RecordingMonitor } = await import('../src/recording/recordingMonitor');
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'recording-monitor-'));
  const outDir = path.join(root, 'out');
  const baseDir = path.join(root, 'recordings');
  await fs.mkdir(outDir, { recursive: true });

  const egress = new FakeEgress();
  const store = new FakeStore();
  const storage = new FakeStorage();
  const monitor = new RecordingMonitor({
    egress,
    store,
    baseDir,
    egressOutputDir: outDir,
    pollIntervalMs: 60_000,
    upload: options.withStorage
      ? {
          storage,
          prefix: 'call-recordings',
          usePresignedUrls: true,
          presignedUrlTtlSeconds: 604800,
          deleteLocalAfterUpload: true,
        }
      : null,
    settleTimeoutMs: options.settleTimeoutMs,
    now: () => STARTED_AT,
  });

  return { monitor, egress, store, storage, root, outDir, baseDir };
}

test('completed recording is moved, uploaded, then deleted locally', async () => {
  const { monitor, egress, store, storage, outDir, baseDir } = await setup({ withStorage: true });

  const egressId = await monitor.start('room-1', 'call-1');
  assert.equal(egressId, 'EG_1');
  assert.deepEqual(egress.started, [{ roomName: 'room-1', filepath: path.join(outDir, 'room-1_1704164645.mp4') }]);
  assert.equal(store.inserted.length, 1);
  assert.equal(store.inserted[0].status, 'RECORDING');

  const source = path.join(outDir, 'room-1_1704164645.mp4');
  await fs.writeFile(source, Buffer.from([1, 2, 3]));
  egress.snapshot = { egressId: 'EG_1', state: 'complete', filename: source, durationSeconds: 12.5 };

  const job = await monitor.finalize('EG_1', 1000);
  const finalPath = path.join(baseDir, '2024', '01', '02', 'call-1_EG_1.mp4');
  const key = 'call-recordings/2024/01/02/call-1_EG_1.mp4';

  assert.ok(job);
  assert.equal(job.status, 'COMPLETED');
  assert.equal(job.filePath, finalPath);
  assert.equal(job.fileSize, 3);
  assert.equal(job.durationSeconds, 12.5);
  assert.equal(job.fileUrl, `https://storage.test/${key}?ttl=604800`);
  assert.deepEqual(storage.uploads, [{ localPath: finalPath, key, contentType: 'video/mp4', existed: true }]);
  assert.equal(existsSync(finalPath), false);
  assert.equal(existsSync(source), false);
  assert.equal(store.updated.length, 1);
  assert.equal(store.updated[0].status, 'COMPLETED');
  assert.equal(monitor.getJob('EG_1'), null);
});

test('failed upload keeps the local file and leaves the url empty', async () => {
  const { monitor, egress, storage, outDir, baseDir } = await setup({ withStorage: true });
  storage.fail = true;

  await monitor.start('room-2', 'call-2');
  const source = path.join(outDir, 'egress-output.mp4');
  await fs.writeFile(source, Buffer.from([1, 2, 3, 4]));
  egress.snapshot = { egressId: 'EG_1', state: 'complete', filename: source };

  const job = await monitor.finalize('EG_1', 1000);
  const finalPath = path.join(baseDir, '2024', '01', '02', 'call-2_EG_1.mp4');

  assert.ok(job);
  assert.equal(job.status, 'COMPLETED');
  assert.equal(job.fileUrl, null);
  assert.equal(job.filePath, finalPath);
  assert.equal(job.fileSize, 4);
  assert.equal(job.durationSeconds, null);
  assert.equal(existsSync(finalPath), true);
});

test('local-only recording keeps its organized path', async () => {
  const { monitor, egress, storage, outDir, baseDir } = await setup();

  await monitor.start('room-3', 'call-3');
  const source = path.join(outDir, 'egress-output.mp4');
  await fs.writeFile(source, Buffer.from([9]));
  egress.snapshot = { egressId: 'EG_1', state: 'complete', filename: source };

  const job = await monitor.finalize('EG_1', 1000);

  assert.ok(job);
  assert.equal(job.filePath, path.join(baseDir, '2024', '01', '02', 'call-3_EG_1.mp4'));
  assert.equal(job.fileUrl, null);
  assert.equal(storage.uploads.length, 0);
});

test('egress that disappears is marked failed', async () => {
  const { monitor, egress, store } = await setup();

  await monitor.start('room-4', 'call-4');
  egress.snapshot = null;

  const job = await monitor.finalize('EG_1', 1000);

  assert.ok(job);
  assert.equal(job.status, 'FAILED');
  assert.equal(job.filePath, null);
  assert.deepEqual(
    store.updated.map((row) => row.status),
    ['FAILED'],
  );
});

test('platform failure state is terminal', async () => {
  const { monitor, egress } = await setup();

  await monitor.start('room-5', 'call-5');
  egress.snapshot = { egressId: 'EG_1', state: 'failed', error: 'limit reached' };

  const job = await monitor.finalize('EG_1', 1000);
  assert.equal(job?.status, 'FAILED');
});

test('finalize gives up after the grace period and cancels the loop', async () => {
  const { monitor, store } = await setup();

  await monitor.start('room-6', 'call-6');
  const job = await monitor.finalize('EG_1', 20);

  assert.ok(job);
  assert.equal(job.status, 'RECORDING');
  assert.equal(store.updated.length, 0);
  assert.equal(monitor.getJob('EG_1'), null);
  assert.equal(await monitor.finalize('EG_1', 20), null);
});

test('a hung poll does not hold finalize past its bounds', async () => {
  const { monitor, egress, store } = await setup({ settleTimeoutMs: 30 });
  let release: () => void = () => undefined;
  egress.pollGate = new Promise<void>((resolve) => {
    release = resolve;
  });

  await monitor.start('room-6', 'call-6');
  const job = await monitor.finalize('EG_1', 20);

  assert.equal(egress.polls, 1);
  assert.ok(job);
  assert.equal(job.status, 'RECORDING');
  assert.equal(monitor.getJob('EG_1'), null);
  assert.equal(store.updated.length, 0);

  egress.snapshot = { egressId: 'EG_1', state: 'complete' };
  release();
  await waitFor(() => store.updated.length === 1);

  assert.equal(store.updated[0].status, 'COMPLETED');
  assert.equal(store.updated[0].filePath, null);
});

test('recording info prefers the live job and falls back to the stored row', async () => {
  const { monitor, egress } = await setup();

  await monitor.start('room-3', 'call-3');
  const live = await monitor.getRecordingInfo('call-3');
  assert.equal(live?.egressId, 'EG_1');
  assert.equal(live?.status, 'RECORDING');

  egress.snapshot = { egressId: 'EG_1', state: 'complete', durationSeconds: 7 };
  await monitor.finalize('EG_1', 1000);

  const stored = await monitor.getRecordingInfo('call-3');
  assert.equal(stored?.status, 'COMPLETED');
  assert.equal(stored?.durationSeconds, 7);
  assert.equal(await monitor.getRecordingInfo('call-404'), null);
});

test('egress lookups only accept an exact id', async () => {
  const { selectEgress } = await import('../src/platform/livekitPlatform');
  const items = [{ egressId: 'EG_2' }, { egressId: 'EG_1' }];

  assert.equal(selectEgress(items, 'EG_1'), items[1]);
  assert.equal(selectEgress([{ egressId: 'EG_2' }], 'EG_1'), null);
  assert.equal(selectEgress([], 'EG_1'), null);
});

test('start failures are logged and return null', async () => {
  const { monitor, egress, store } = await setup();
  egress.failStart = true;

  assert.equal(await monitor.start('room-7', 'call-7'), null);
  assert.equal(store.inserted.length, 0);
});

test('stop forwards to the platform', async () => {
  const { monitor, egress } = await setup();

  await monitor.start('room-8', 'call-8');
  await monitor.stop('EG_1');
  await monitor.shutdown();

  assert.deepEqual(egress.stopped, ['EG_1']);
});

test('terminal jobs ignore further transitions', async () => {
  const { applyRecordingTransition } = await import('../src/recording/types');
  const job: RecordingJob = {
    egressId: 'EG_9',
    roomName: 'room-9',
    callId: 'call-9',
    status: 'RECORDING',
    startedAt: STARTED_AT,
    completedAt: null,
    filePath: null,
    fileUrl: null,
    fileSize: null,
    durationSeconds: null,
    format: 'mp4',
  };

  const failed = applyRecordingTransition(job, 'FAILED', { completedAt: STARTED_AT });
  const again = applyRecordingTransition(failed, 'COMPLETED', { filePath: '/tmp/x.mp4' });

  assert.equal(failed.status, 'FAILED');
  assert.equal(again, failed);
  assert.equal(job.status, 'RECORDING');
});
