import { promises as fs } from 'fs';

export function sanitizeSegment(value: string): string {
  const sanitized = value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
  return sanitized.length > 0 ? sanitized : 'unknown';
}

/** `YYYY/MM/DD` segments for the UTC date of `at`. */
export function datePathSegments(at: Date): [string, string, string] {
  return [
    String(at.getUTCFullYear()),
    String(at.getUTCMonth() + 1).padStart(2, '0'),
    String(at.getUTCDate()).padStart(2, '0'),
  ];
}

export function epochSeconds(at: Date): number {
  return Math.floor(at.getTime() / 1000);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errnoCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}

/** Renames `source` to `target`, copying then unlinking when they sit on different devices. */
export async function moveFile(source: string, target: string): Promise<void> {
  try {
    await fs.rename(source, target);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') {
      throw error;
    }
    await fs.copyFile(source, target);
    await fs.unlink(source);
  }
}
