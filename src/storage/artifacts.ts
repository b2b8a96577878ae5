import { promises as fs } from 'fs';
import path from 'path';
import type { FrameSample } from '../audio/audioCapture';
import { DISPOSITION_LABELS, type DispositionSnapshot } from '../disposition/types';
import { epochSeconds, sanitizeSegment } from './paths';

export interface TranscriptArtifact {
  room: string;
  phone: string;
  transcript: DispositionSnapshot['transcript'];
  disposition: {
    disposition: string | null;
    label: string | null;
    connection_status: string | null;
    history: DispositionSnapshot['history'];
    call_duration_seconds: number;
  };
  audio_frames_sample: FrameSample[];
  call_start: number;
  call_end: number;
}

export function transcriptArtifactPath(baseDir: string, roomName: string, callStart: Date): string {
  return path.join(baseDir, 'transcripts', `${sanitizeSegment(roomName)}_${epochSeconds(callStart)}.json`);
}

export function audioArtifactPath(baseDir: string, roomName: string, callStart: Date): string {
  return path.join(baseDir, 'audio', `${sanitizeSegment(roomName)}_${epochSeconds(callStart)}.wav`);
}

export function buildTranscriptArtifact(input: {
  roomName: string;
  phoneNumber: string;
  snapshot: DispositionSnapshot;
  frameSample: FrameSample[];
  callStart: Date;
  callEnd: Date;
}): TranscriptArtifact {
  const { snapshot } = input;
  return {
    room: input.roomName,
    phone: input.phoneNumber,
    transcript: snapshot.transcript,
    disposition: {
      disposition: snapshot.disposition,
      label: snapshot.disposition ? DISPOSITION_LABELS[snapshot.disposition] : null,
      connection_status: snapshot.connectionStatus,
      history: snapshot.history,
      call_duration_seconds: snapshot.callDurationSeconds,
    },
    audio_frames_sample: input.frameSample,
    call_start: epochSeconds(input.callStart),
    call_end: epochSeconds(input.callEnd),
  };
}

export async function writeTranscriptArtifact(filePath: string, artifact: TranscriptArtifact): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(artifact, null, 2)}\n`, 'utf8');
}
