import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('wav header describes mono pcm16', async () => {
  const { buildWavHeader } = await import('../src/audio/wavWriter');
  const header = buildWavHeader(3200, 16000, 1);

  assert.equal(header.length, 44);
  assert.equal(header.toString('ascii', 0, 4), 'RIFF');
  assert.equal(header.readUInt32LE(4), 3236);
  assert.equal(header.toString('ascii', 8, 12), 'WAVE');
  assert.equal(header.toString('ascii', 12, 16), 'fmt ');
  assert.equal(header.readUInt16LE(20), 1);
  assert.equal(header.readUInt16LE(22), 1);
  assert.equal(header.readUInt32LE(24), 16000);
  assert.equal(header.readUInt32LE(28), 32000);
  assert.equal(header.readUInt16LE(32), 2);
  assert.equal(header.readUInt16LE(34), 16);
  assert.equal(header.toString('ascii', 36, 40), 'data');
  assert.equal(header.readUInt32LE(40), 3200);
});

test('frame queue drops the oldest frames when full', async () => {
  const { FrameQueue } = await import('../src/audio/audioCapture');
  const queue = new FrameQueue(2);

  queue.push(Buffer.from([1]));
  queue.push(Buffer.from([2]));
  queue.push(Buffer.from([3]));
  queue.close();

  const frames: number[] = [];
  for await (const frame of queue) {
    frames.push(frame[0]);
  }

  assert.deepEqual(frames, [2, 3]);
  assert.equal(queue.droppedCount, 1);
  assert.equal(queue.size, 0);
});

test('frame queue hands frames straight to a waiting reader', async () => {
  const { FrameQueue } = await import('../src/audio/audioCapture');
  const queue = new FrameQueue(1);

  const next = queue.next();
  queue.push(Buffer.from([7]));
  queue.push(Buffer.from([8]));

  const first = await next;
  assert.equal(first.done, false);
  assert.deepEqual(first.value, Buffer.from([7]));
  assert.equal(queue.size, 1);
  assert.equal(queue.droppedCount, 0);
});

test('capture writes frames to a wav file and caps the sample', async () => {
  const { AudioCapture } = await import('../src/audio/audioCapture');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-capture-'));
  const filePath = path.join(dir, 'audio', 'room-1_1704164645.wav');

  const capture = new AudioCapture({
    callId: 'call-1',
    filePath,
    sampleLimit: 2,
    now: () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)),
  });
  const running = capture.run();

  capture.push(Buffer.alloc(640, 1));
  capture.push(Buffer.alloc(320, 2));
  capture.push(Buffer.alloc(320, 3));

  const summary = await capture.close();
  await running;

  assert.equal(summary.framesReceived, 3);
  assert.equal(summary.framesWritten, 3);
  assert.equal(summary.framesDropped, 0);
  assert.equal(summary.bytesWritten, 1280);
  assert.deepEqual(summary.sample, [
    { index: 0, bytes: 640, durationMs: 20, receivedAt: '2024-01-02T03:04:05.000Z' },
    { index: 1, bytes: 320, durationMs: 10, receivedAt: '2024-01-02T03:04:05.000Z' },
  ]);

  const contents = await fs.readFile(filePath);
  assert.equal(contents.length, 44 + 1280);
  assert.equal(contents.readUInt32LE(40), 1280);
  assert.equal(contents[44], 1);
  assert.equal(contents[44 + 640], 2);
  assert.equal(contents[44 + 960], 3);
});

test('closing a capture that never ran still writes an empty file', async () => {
  const { AudioCapture } = await import('../src/audio/audioCapture');
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-capture-'));
  const filePath = path.join(dir, 'empty.wav');

  const capture = new AudioCapture({ callId: 'call-2', filePath, sampleLimit: 5 });
  const summary = await capture.close();

  assert.equal(summary.framesWritten, 0);
  assert.equal((await fs.readFile(filePath)).length, 44);
});
