import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';

const HEADER_BYTES = 44;

export function buildWavHeader(dataSize: number, sampleRate: number, channels: number): Buffer {
  const bytesPerSample = 2;
  const blockAlign = channels * bytesPerSample;
  const byteRate = sampleRate * blockAlign;

  const header = Buffer.alloc(HEADER_BYTES);
  header.write('RIFF', 0);
  header.writeUInt32LE(36 + dataSize, 4);
  header.write('WAVE', 8);

  header.write('fmt ', 12);
  header.writeUInt32LE(16, 16); // PCM fmt chunk size
  header.writeUInt16LE(1, 20); // format = 1 (PCM)
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34); // bits per sample

  header.write('data', 36);
  header.writeUInt32LE(dataSize, 40);
  return header;
}

/**
 * Streams PCM16 to disk. The header is written with zero sizes on open and
 * patched on close, so memory use does not grow with call length.
 */
export class WavFileWriter {
  private handle: FileHandle | null = null;
  private dataBytes = 0;

  constructor(
    public readonly filePath: string,
    private readonly sampleRate = 16000,
    private readonly channels = 1,
  ) {}

  public get bytesWritten(): number {
    return this.dataBytes;
  }

  public async open(): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    this.handle = await fs.open(this.filePath, 'w');
    await this.handle.write(buildWavHeader(0, this.sampleRate, this.channels), 0, HEADER_BYTES, 0);
  }

  public async write(pcm16: Buffer): Promise<void> {
    if (!this.handle) {
      throw new Error('wav writer is not open');
    }
    if (pcm16.length === 0) return;
    await this.handle.write(pcm16, 0, pcm16.length, HEADER_BYTES + this.dataBytes);
    this.dataBytes += pcm16.length;
  }

  public async close(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      await handle.write(buildWavHeader(this.dataBytes, this.sampleRate, this.channels), 0, HEADER_BYTES, 0);
    } finally {
      await handle.close();
    }
  }
}
