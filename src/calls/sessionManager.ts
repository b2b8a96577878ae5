import { randomUUID } from 'crypto';
import { BridgeVoiceSession, type BridgeSocket } from '../bridge/sessionBridge';
import type { DispositionRuleSet } from '../disposition/rules';
import { release, tryAcquire, type AcquireResult, type CapacityParams, type ReleaseParams } from '../limits/capacity';
import { log } from '../log';
import { incCapacityRejection, setActiveCalls } from '../metrics';
import type { PersistenceGateway } from '../persistence/types';
import type { AgentDispatcher, CallPlatform } from '../platform/types';
import { CallSession, type CallSettings, type RecordingControl } from './callSession';
import type { CallSessionId, DialInfo, TeardownReason } from './types';

export interface SessionLogContext {
  requestId?: string;
}

export interface SessionManagerOptions {
  platform: CallPlatform;
  dispatcher: AgentDispatcher;
  recordings: RecordingControl | null;
  persistence: PersistenceGateway;
  rules: DispositionRuleSet;
  settings: CallSettings;
  sessionStartTimeoutMs: number;
  capacityAcquire?: (params: CapacityParams) => Promise<AcquireResult>;
  capacityRelease?: (params: ReleaseParams) => Promise<void>;
  now?: () => number;
}

export type CreateCallResult =
  | { ok: true; session: CallSession }
  | { ok: false; reason: 'at_capacity' | 'duplicate_call' };

export function buildRoomName(phoneNumber: string, callId: string): string {
  const digits = phoneNumber.replace(/\D/g, '');
  return `outbound-${digits}-${callId.replace(/-/g, '').slice(0, 8)}`;
}

export function buildDispatchMetadata(dialInfo: DialInfo): Record<string, unknown> {
  return {
    phone_number: dialInfo.fromNumber ? `${dialInfo.fromNumber},${dialInfo.phoneNumber}` : dialInfo.phoneNumber,
    transfer_to: dialInfo.transferTo ?? null,
    account_info: dialInfo.customerInfo,
  };
}

/**
 * Per-process registry of live calls. Created once at startup and handed to
 * the HTTP and bridge layers; owns admission and the room -> call index.
 */
export class SessionManager {
  private readonly sessions = new Map<CallSessionId, CallSession>();
  private readonly bridges = new Map<CallSessionId, BridgeVoiceSession>();
  private readonly rooms = new Map<string, CallSessionId>();
  private readonly runs = new Map<CallSessionId, Promise<void>>();
  private readonly capacityAcquire: (params: CapacityParams) => Promise<AcquireResult>;
  private readonly capacityRelease: (params: ReleaseParams) => Promise<void>;
  private shuttingDown = false;

  constructor(private readonly options: SessionManagerOptions) {
    this.capacityAcquire = options.capacityAcquire ?? tryAcquire;
    this.capacityRelease = options.capacityRelease ?? release;
  }

  public get size(): number {
    return this.sessions.size;
  }

  public async createCall(
    dialInfo: DialInfo,
    callId: CallSessionId = randomUUID(),
    context: SessionLogContext = {},
  ): Promise<CreateCallResult> {
    if (this.shuttingDown) {
      return { ok: false, reason: 'at_capacity' };
    }
    if (this.sessions.has(callId)) {
      log.warn({ event: 'call_session_exists', call_id: callId, requestId: context.requestId }, 'call session exists');
      return { ok: false, reason: 'duplicate_call' };
    }

    const admission = await this.capacityAcquire({ callId, requestId: context.requestId });
    if (!admission.ok) {
      incCapacityRejection();
      return { ok: false, reason: 'at_capacity' };
    }

    const roomName = buildRoomName(dialInfo.phoneNumber, callId);
    try {
      await this.options.platform.rooms.createRoom(roomName);
    } catch (error) {
      await this.capacityRelease({ callId, requestId: context.requestId });
      throw error;
    }

    const voice = new BridgeVoiceSession({
      callId,
      roomName,
      dispatcher: this.options.dispatcher,
      metadata: buildDispatchMetadata(dialInfo),
      startTimeoutMs: this.options.sessionStartTimeoutMs,
    });

    const session = new CallSession({
      callId,
      roomName,
      dialInfo,
      platform: this.options.platform,
      voice,
      recordings: this.options.recordings,
      persistence: this.options.persistence,
      rules: this.options.rules,
      settings: this.options.settings,
      now: this.options.now,
      onFinished: (finished) => this.finalize(finished, context),
    });

    this.sessions.set(callId, session);
    this.bridges.set(callId, voice);
    this.rooms.set(roomName, callId);
    setActiveCalls(this.sessions.size);

    log.info(
      { event: 'call_session_created', call_id: callId, room: roomName, requestId: context.requestId },
      'call session created',
    );

    const run = session.run().catch((error: unknown) => {
      log.error({ err: error, event: 'call_session_run_failed', call_id: callId }, 'call session run failed');
    });
    this.runs.set(callId, run);

    return { ok: true, session };
  }

  public get(callId: CallSessionId): CallSession | undefined {
    return this.sessions.get(callId);
  }

  /** Live calls, most recently started first. */
  public list(limit?: number): CallSession[] {
    const sessions = Array.from(this.sessions.values()).reverse();
    sessions.sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime());
    return limit === undefined ? sessions : sessions.slice(0, limit);
  }

  public getByRoom(roomName: string): CallSession | undefined {
    const callId = this.rooms.get(roomName);
    return callId ? this.sessions.get(callId) : undefined;
  }

  /** Binds the agent's socket to its call. Returns null when the call is unknown or already bound. */
  public attachBridge(callId: CallSessionId, socket: BridgeSocket): BridgeVoiceSession | null {
    const voice = this.bridges.get(callId);
    if (!voice) {
      log.warn({ event: 'bridge_attach_unknown_call', call_id: callId }, 'bridge attach for unknown call');
      return null;
    }
    if (!voice.attach(socket)) {
      log.warn({ event: 'bridge_attach_rejected', call_id: callId }, 'bridge attach rejected');
      return null;
    }
    log.info({ event: 'bridge_attached', call_id: callId }, 'bridge attached');
    return voice;
  }

  /** Platform signalled the room or the callee is gone. */
  public onRoomClosed(roomName: string, detail: string): void {
    const session = this.getByRoom(roomName);
    if (!session) {
      log.info({ event: 'room_closed_unknown', room: roomName, detail }, 'room closed for unknown call');
      return;
    }
    log.info({ event: 'room_closed', call_id: session.callId, room: roomName, detail }, 'room closed');
    void session.teardown('platform_closed');
  }

  public onParticipantLeft(roomName: string, identity: string): void {
    const session = this.getByRoom(roomName);
    if (!session || session.participantIdentity !== identity) {
      return;
    }
    this.onRoomClosed(roomName, `participant_left:${identity}`);
  }

  public teardown(callId: CallSessionId, reason: TeardownReason): Promise<void> {
    const session = this.sessions.get(callId);
    return session ? session.teardown(reason) : Promise.resolve();
  }

  /** Tears down every call and waits for each to finish. */
  public async shutdown(): Promise<void> {
    this.shuttingDown = true;
    const sessions = Array.from(this.sessions.values());
    log.info({ event: 'session_manager_shutdown', active_calls: sessions.length }, 'session manager shutdown');
    await Promise.all(sessions.map((session) => session.teardown('shutdown')));
    await Promise.all(Array.from(this.runs.values()));
    this.sessions.clear();
    this.bridges.clear();
    this.rooms.clear();
    this.runs.clear();
    setActiveCalls(0);
  }

  private finalize(session: CallSession, context: SessionLogContext): void {
    if (this.sessions.get(session.callId) !== session) {
      return;
    }
    this.sessions.delete(session.callId);
    this.bridges.delete(session.callId);
    this.rooms.delete(session.roomName);
    this.runs.delete(session.callId);
    setActiveCalls(this.sessions.size);

    void this.capacityRelease({ callId: session.callId, requestId: context.requestId }).catch((error: unknown) => {
      log.error({ err: error, event: 'capacity_release_failed', call_id: session.callId }, 'capacity release failed');
    });

    log.info(
      {
        event: 'call_session_finalized',
        call_id: session.callId,
        room: session.roomName,
        state: session.getState(),
        reason: session.getTeardownReason(),
        requestId: context.requestId,
      },
      'call session finalized',
    );
  }
}
