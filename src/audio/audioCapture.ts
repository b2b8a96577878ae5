import { log } from '../log';
import { WavFileWriter } from './wavWriter';

export const CAPTURE_SAMPLE_RATE_HZ = 16000;

export interface FrameSample {
  index: number;
  bytes: number;
  durationMs: number;
  receivedAt: string;
}

export interface CaptureSummary {
  filePath: string;
  framesReceived: number;
  framesWritten: number;
  framesDropped: number;
  bytesWritten: number;
  sample: FrameSample[];
}

/**
 * Bounded single-consumer frame queue. When full, the oldest queued frame is
 * dropped to make room.
 */
export class FrameQueue implements AsyncIterable<Buffer> {
  private frames: Buffer[] = [];
  private waiter: ((result: IteratorResult<Buffer>) => void) | null = null;
  private closed = false;
  private dropped = 0;

  constructor(private readonly maxFrames: number) {}

  public get droppedCount(): number {
    return this.dropped;
  }

  public get size(): number {
    return this.frames.length;
  }

  public push(frame: Buffer): void {
    if (this.closed) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: frame, done: false });
      return;
    }
    this.frames.push(frame);
    while (this.frames.length > this.maxFrames) {
      this.frames.shift();
      this.dropped += 1;
    }
  }

  public close(): void {
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  public next(): Promise<IteratorResult<Buffer>> {
    const frame = this.frames.shift();
    if (frame) {
      return Promise.resolve({ value: frame, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  public [Symbol.asyncIterator](): AsyncIterator<Buffer> {
    return { next: () => this.next() };
  }
}

export interface AudioCaptureOptions {
  callId: string;
  filePath: string;
  sampleLimit: number;
  maxQueuedFrames?: number;
  now?: () => Date;
}

/**
 * Streams caller audio to a WAV file while keeping a capped sample of frame
 * metadata for the transcript artifact.
 */
export class AudioCapture {
  private readonly queue: FrameQueue;
  private readonly writer: WavFileWriter;
  private readonly now: () => Date;
  private readonly sample: FrameSample[] = [];
  private framesReceived = 0;
  private framesWritten = 0;
  private task: Promise<void> | null = null;

  constructor(private readonly options: AudioCaptureOptions) {
    this.queue = new FrameQueue(options.maxQueuedFrames ?? 500);
    this.writer = new WavFileWriter(options.filePath, CAPTURE_SAMPLE_RATE_HZ, 1);
    this.now = options.now ?? (() => new Date());
  }

  /** Opens the file and starts the consumer. Resolves once the consumer has ended. */
  public run(): Promise<void> {
    if (!this.task) {
      this.task = this.consume();
    }
    return this.task;
  }

  public push(frame: Buffer): void {
    this.framesReceived += 1;
    if (this.sample.length < this.options.sampleLimit) {
      this.sample.push({
        index: this.framesReceived - 1,
        bytes: frame.length,
        durationMs: (frame.length / 2 / CAPTURE_SAMPLE_RATE_HZ) * 1000,
        receivedAt: this.now().toISOString(),
      });
    }
    this.queue.push(frame);
  }

  public async close(): Promise<CaptureSummary> {
    this.queue.close();
    await this.run();
    return this.summary();
  }

  public summary(): CaptureSummary {
    return {
      filePath: this.options.filePath,
      framesReceived: this.framesReceived,
      framesWritten: this.framesWritten,
      framesDropped: this.queue.droppedCount,
      bytesWritten: this.writer.bytesWritten,
      sample: this.sample.slice(),
    };
  }

  private async consume(): Promise<void> {
    await this.writer.open();
    try {
      for await (const frame of this.queue) {
        await this.writer.write(frame);
        this.framesWritten += 1;
      }
    } finally {
      await this.writer.close();
      log.info(
        {
          event: 'audio_capture_closed',
          call_id: this.options.callId,
          file_path: this.options.filePath,
          frames_written: this.framesWritten,
          frames_dropped: this.queue.droppedCount,
        },
        'audio capture closed',
      );
    }
  }
}
