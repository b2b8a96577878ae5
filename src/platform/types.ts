import type { SessionEvent } from '../bridge/events';

/** A dial that did not reach the callee. Carries the SIP outcome when the platform reports one. */
export class DialError extends Error {
  public readonly sipStatusCode?: string;
  public readonly sipStatus?: string;

  constructor(message: string, details: { sipStatusCode?: string; sipStatus?: string } = {}) {
    super(message);
    this.name = 'DialError';
    this.sipStatusCode = details.sipStatusCode;
    this.sipStatus = details.sipStatus;
  }

  /** Text fed to the dial-failure classifier. */
  public rawStatus(): string {
    const sip = [this.sipStatusCode, this.sipStatus].filter(Boolean).join(' ').trim();
    return sip !== '' ? sip : this.message;
  }
}

export interface RoomService {
  createRoom(roomName: string): Promise<void>;
  deleteRoom(roomName: string): Promise<void>;
  waitForParticipant(roomName: string, identity: string, timeoutMs: number): Promise<void>;
}

export interface DialRequest {
  roomName: string;
  phoneNumber: string;
  participantIdentity: string;
  fromNumber?: string;
}

export interface SipService {
  /** Resolves once the callee answers; rejects with DialError otherwise. */
  createSipParticipant(request: DialRequest): Promise<void>;
  transferSipParticipant(roomName: string, participantIdentity: string, transferTo: string): Promise<void>;
}

export type EgressState = 'active' | 'complete' | 'failed';

export interface EgressSnapshot {
  egressId: string;
  state: EgressState;
  filename?: string;
  sizeBytes?: number;
  durationSeconds?: number;
  error?: string;
}

export interface EgressService {
  /** Returns the platform job identifier. */
  startRoomAudioRecording(roomName: string, filepath: string): Promise<string>;
  stopRecording(egressId: string): Promise<void>;
  /** Null when the platform no longer knows the job. */
  getRecording(egressId: string): Promise<EgressSnapshot | null>;
}

export interface AgentDispatcher {
  dispatch(roomName: string, metadata: Record<string, unknown>): Promise<void>;
}

export interface VoiceSession {
  start(): Promise<void>;
  onEvent(listener: (event: SessionEvent) => void): void;
  onAudioFrame(listener: (frame: Buffer) => void): void;
  say(instructions: string): Promise<void>;
  waitForPlayout(): Promise<void>;
  sendToolResult(toolCallId: string, output: string): void;
  close(reason: string): Promise<void>;
}

export interface CallPlatform {
  rooms: RoomService;
  sip: SipService;
  egress: EgressService;
}
