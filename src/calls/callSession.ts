import { AudioCapture, type CaptureSummary } from '../audio/audioCapture';
import { isKnownTool, type SessionEvent, type ToolCallEvent } from '../bridge/events';
import { dispositionForDialFailure } from '../disposition/classifier';
import type { DispositionRuleSet } from '../disposition/rules';
import { DispositionTracker } from '../disposition/tracker';
import { DISPOSITION_LABELS, type Disposition } from '../disposition/types';
import { log } from '../log';
import { recordCallMetrics } from '../metrics';
import type { PersistenceGateway } from '../persistence/types';
import { DialError, type CallPlatform, type VoiceSession } from '../platform/types';
import type { RecordingMonitor } from '../recording/recordingMonitor';
import type { RecordingJob } from '../recording/types';
import {
  audioArtifactPath,
  buildTranscriptArtifact,
  transcriptArtifactPath,
  writeTranscriptArtifact,
} from '../storage/artifacts';
import { sleep, TaskGroup, type TaskHandle } from './taskGroup';
import { balanceSummary, type CallState, type CallStatusView, type DialInfo, type TeardownReason } from './types';
import { SerialQueue } from './workQueue';

export type RecordingControl = Pick<RecordingMonitor, 'start' | 'stop' | 'finalize' | 'getJob'>;

export interface CallSettings {
  participantJoinTimeoutMs: number;
  maxDurationSeconds: number;
  recordingGraceMs: number;
  teardownJoinTimeoutMs: number;
  artifactsDir: string | null;
  audioCapture: { sampleLimit: number } | null;
}

export interface CallSessionOptions {
  callId: string;
  roomName: string;
  dialInfo: DialInfo;
  platform: CallPlatform;
  voice: VoiceSession;
  recordings: RecordingControl | null;
  persistence: PersistenceGateway;
  rules: DispositionRuleSet;
  settings: CallSettings;
  now?: () => number;
  onFinished?: (session: CallSession) => void;
}

const ALLOWED_TRANSITIONS: Record<CallState, CallState[]> = {
  INITIATED: ['DIALING', 'FAILED'],
  DIALING: ['CONNECTED', 'FAILED'],
  CONNECTED: ['IN_PROGRESS', 'COMPLETED', 'FAILED'],
  IN_PROGRESS: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

const TRANSFER_ANNOUNCEMENT = "let the user know you'll be transferring them";
const TRANSFER_APOLOGY = 'there was an error transferring the call.';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Controller for one outbound call: dials, wires the voice session to the
 * disposition tracker, runs tools, and tears everything down exactly once.
 */
export class CallSession {
  public readonly callId: string;
  public readonly roomName: string;
  public readonly participantIdentity: string;
  public readonly dialInfo: DialInfo;
  public readonly startedAt: Date;

  private readonly platform: CallPlatform;
  private readonly voice: VoiceSession;
  private readonly recordings: RecordingControl | null;
  private readonly persistence: PersistenceGateway;
  private readonly rules: DispositionRuleSet;
  private readonly settings: CallSettings;
  private readonly now: () => number;
  private readonly onFinished?: (session: CallSession) => void;
  private readonly tracker: DispositionTracker;
  private readonly queue: SerialQueue;
  private readonly tasks: TaskGroup;
  private readonly logContext: Record<string, unknown>;

  private state: CallState = 'INITIATED';
  private egressId: string | null = null;
  private recordingJob: RecordingJob | null = null;
  private capture: AudioCapture | null = null;
  private timeoutTask: TaskHandle | null = null;
  private dispositionForced = false;
  private teardownPromise: Promise<void> | null = null;
  private teardownReason: TeardownReason | null = null;

  constructor(options: CallSessionOptions) {
    this.callId = options.callId;
    this.roomName = options.roomName;
    this.dialInfo = options.dialInfo;
    this.participantIdentity = options.dialInfo.phoneNumber;
    this.platform = options.platform;
    this.voice = options.voice;
    this.recordings = options.recordings;
    this.persistence = options.persistence;
    this.rules = options.rules;
    this.settings = options.settings;
    this.now = options.now ?? Date.now;
    this.onFinished = options.onFinished;
    this.startedAt = new Date(this.now());
    this.tracker = new DispositionTracker({ rules: options.rules, now: this.now });
    this.logContext = { call_id: this.callId, room: this.roomName };
    this.queue = new SerialQueue(this.logContext);
    this.tasks = new TaskGroup(this.logContext);
  }

  public getState(): CallState {
    return this.state;
  }

  public isTearingDown(): boolean {
    return this.teardownPromise !== null;
  }

  public getTracker(): DispositionTracker {
    return this.tracker;
  }

  public getRecordingJob(): RecordingJob | null {
    if (this.recordingJob) {
      return this.recordingJob;
    }
    return this.egressId && this.recordings ? this.recordings.getJob(this.egressId) : null;
  }

  public view(): CallStatusView {
    const job = this.getRecordingJob();
    const disposition = this.tracker.getCurrentDisposition();
    return {
      call_id: this.callId,
      room_name: this.roomName,
      state: this.state,
      connection_status: this.tracker.getConnectionStatus(),
      disposition: disposition ? DISPOSITION_LABELS[disposition] : null,
      started_at: this.startedAt.toISOString(),
      recording: job ? { egress_id: job.egressId, status: job.status, file_url: job.fileUrl } : null,
    };
  }

  /** Places the call. Resolves once the call is in progress or has been torn down. */
  public async run(): Promise<void> {
    try {
      await this.persistence.recordCallStarted(this.callId, this.roomName, this.dialInfo.phoneNumber);

      this.voice.onEvent((event) => this.dispatchEvent(event));
      this.voice.onAudioFrame((frame) => this.capture?.push(frame));

      try {
        await this.voice.start();
      } catch (error) {
        if (this.isTearingDown()) return;
        log.error({ ...this.logContext, err: error, event: 'voice_session_start_failed' }, 'voice session start failed');
        await this.failCall('FAILED', errorMessage(error), 'session_start_failed');
        return;
      }
      if (this.isTearingDown()) return;

      this.transition('DIALING');
      try {
        await this.platform.sip.createSipParticipant({
          roomName: this.roomName,
          phoneNumber: this.dialInfo.phoneNumber,
          participantIdentity: this.participantIdentity,
          fromNumber: this.dialInfo.fromNumber,
        });
      } catch (error) {
        if (this.isTearingDown()) return;
        await this.handleDialFailure(error, 'dial_failed');
        return;
      }
      if (this.isTearingDown()) return;

      try {
        await this.platform.rooms.waitForParticipant(
          this.roomName,
          this.participantIdentity,
          this.settings.participantJoinTimeoutMs,
        );
      } catch (error) {
        if (this.isTearingDown()) return;
        await this.handleDialFailure(error, 'participant_join_failed');
        return;
      }
      if (this.isTearingDown()) return;

      this.tracker.setConnectionStatus(true);
      this.transition('CONNECTED');
      log.info({ ...this.logContext, event: 'participant_joined', identity: this.participantIdentity }, 'participant joined');
      await this.persistence.recordCallConnected(this.callId);
      if (this.isTearingDown()) return;

      if (this.recordings) {
        const egressId = await this.recordings.start(this.roomName, this.callId);
        if (this.isTearingDown()) {
          // Teardown has begun and never sees this egress.
          if (egressId) await this.abandonRecording(this.recordings, egressId);
          return;
        }
        this.egressId = egressId;
      }
      this.armTimeout();
      this.startCapture();
      this.transition('IN_PROGRESS');
    } catch (error) {
      log.error({ ...this.logContext, err: error, event: 'call_run_failed', state: this.state }, 'call run failed');
      await this.teardown(this.state === 'INITIATED' ? 'session_start_failed' : 'dial_failed');
    }
  }

  /** Idempotent: every caller shares the first teardown run. */
  public teardown(reason: TeardownReason): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownReason = reason;
      this.teardownPromise = this.performTeardown(reason);
    }
    return this.teardownPromise;
  }

  private dispatchEvent(event: SessionEvent): void {
    this.queue.enqueue({ name: event.type, run: () => this.handleEvent(event) });
  }

  private async handleEvent(event: SessionEvent): Promise<void> {
    switch (event.type) {
      case 'user_input_transcribed': {
        const text = event.transcript.trim();
        if (!event.is_final || text === '') return;
        if (this.tracker.getConnectionStatus() !== 'CONNECTED') {
          log.warn({ ...this.logContext, event: 'transcript_before_connect' }, 'transcript dropped - call not connected');
          return;
        }
        this.tracker.addTranscriptItem('customer', text);
        if (!this.dispositionForced) {
          const disposition = this.tracker.updateDisposition();
          log.info({ ...this.logContext, event: 'disposition_updated', disposition }, 'disposition updated');
        }
        return;
      }
      case 'conversation_item_added': {
        const text = event.text.trim();
        if (event.role === 'assistant' && text !== '') {
          this.tracker.addTranscriptItem('agent', text);
        }
        return;
      }
      case 'tool_call':
        await this.handleToolCall(event);
        return;
      case 'close':
        log.info({ ...this.logContext, event: 'voice_session_closed', reason: event.reason }, 'voice session closed');
        await this.teardown('platform_closed');
        return;
      case 'ack':
        return;
    }
  }

  private async handleToolCall(call: ToolCallEvent): Promise<void> {
    log.info({ ...this.logContext, event: 'tool_call', tool: call.name, tool_call_id: call.id }, 'tool call');

    const name = call.name;
    if (!isKnownTool(name)) {
      log.warn({ ...this.logContext, event: 'tool_call_unsupported', tool: name, tool_call_id: call.id }, 'unsupported tool');
      this.voice.sendToolResult(call.id, `unsupported tool: ${name}`);
      return;
    }

    switch (name) {
      case 'end_call':
        await this.voice.waitForPlayout().catch((error: unknown) => {
          log.warn({ ...this.logContext, err: error, event: 'playout_wait_failed' }, 'playout wait failed');
        });
        this.voice.sendToolResult(call.id, 'ending call');
        await this.teardown('end_call');
        return;

      case 'transfer_call':
        await this.transfer(call);
        return;

      case 'detected_answering_machine':
        this.voice.sendToolResult(call.id, 'hanging up');
        await this.teardown('voicemail');
        return;

      case 'opt_out':
        if (this.tracker.getConnectionStatus() !== 'CONNECTED') {
          this.voice.sendToolResult(call.id, 'call not connected');
          return;
        }
        this.forceDisposition('DO_NOT_CALL');
        this.voice.sendToolResult(call.id, 'customer opted out of further calls');
        return;

      case 'check_account_balance':
        this.voice.sendToolResult(call.id, balanceSummary(this.dialInfo.customerInfo));
        return;
    }
  }

  private async transfer(call: ToolCallEvent): Promise<void> {
    const transferTo = this.dialInfo.transferTo;
    if (!transferTo) {
      this.voice.sendToolResult(call.id, 'cannot transfer call');
      return;
    }

    log.info({ ...this.logContext, event: 'call_transfer_started', transfer_to: transferTo }, 'transferring call');
    await this.voice.say(TRANSFER_ANNOUNCEMENT).catch((error: unknown) => {
      log.warn({ ...this.logContext, err: error, event: 'transfer_announcement_failed' }, 'transfer announcement failed');
    });

    try {
      await this.platform.sip.transferSipParticipant(this.roomName, this.participantIdentity, `tel:${transferTo}`);
      log.info({ ...this.logContext, event: 'call_transferred', transfer_to: transferTo }, 'transferred call');
      this.voice.sendToolResult(call.id, 'call transferred');
    } catch (error) {
      log.error({ ...this.logContext, err: error, event: 'call_transfer_failed', transfer_to: transferTo }, 'error transferring call');
      await this.voice.say(TRANSFER_APOLOGY).catch((sayError: unknown) => {
        log.warn({ ...this.logContext, err: sayError, event: 'transfer_apology_failed' }, 'transfer apology failed');
      });
      this.voice.sendToolResult(call.id, 'transfer failed');
      await this.teardown('transfer_failed');
    }
  }

  private forceDisposition(disposition: Disposition): void {
    this.tracker.updateDisposition(disposition);
    this.dispositionForced = true;
    log.info({ ...this.logContext, event: 'disposition_forced', disposition }, 'disposition forced');
  }

  private async handleDialFailure(error: unknown, reason: TeardownReason): Promise<void> {
    const raw = error instanceof DialError ? error.rawStatus() : errorMessage(error);
    const disposition = dispositionForDialFailure(raw, this.rules) ?? 'FAILED';
    log.warn(
      { ...this.logContext, err: error, event: 'dial_failed', raw_status: raw, disposition },
      'error creating sip participant',
    );
    await this.failCall(disposition, raw, reason);
  }

  private async failCall(disposition: Disposition, rawStatus: string, reason: TeardownReason): Promise<void> {
    this.markNotConnected(disposition);
    await this.persistence.recordCallFailed(this.callId, DISPOSITION_LABELS[disposition], rawStatus);
    await this.teardown(reason);
  }

  private markNotConnected(disposition: Disposition): void {
    this.tracker.setConnectionStatus(false);
    this.tracker.updateDisposition(disposition);
    this.transition('FAILED');
  }

  private async abandonRecording(recordings: RecordingControl, egressId: string): Promise<void> {
    log.warn({ ...this.logContext, event: 'recording_started_after_teardown', egress_id: egressId }, 'stopping late recording');
    await recordings.stop(egressId);
    await recordings.finalize(egressId, this.settings.recordingGraceMs);
  }

  private armTimeout(): void {
    const limitMs = this.settings.maxDurationSeconds * 1000;
    this.timeoutTask = this.tasks.spawn('call_timeout', async (signal) => {
      const elapsed = await sleep(limitMs, signal);
      if (!elapsed) return;
      log.info(
        { ...this.logContext, event: 'call_max_duration_reached', limit_seconds: this.settings.maxDurationSeconds },
        'call reached duration limit, hanging up',
      );
      void this.teardown('timeout');
    });
  }

  private startCapture(): void {
    const captureSettings = this.settings.audioCapture;
    if (!captureSettings || !this.settings.artifactsDir) return;

    const capture = new AudioCapture({
      callId: this.callId,
      filePath: audioArtifactPath(this.settings.artifactsDir, this.roomName, this.startedAt),
      sampleLimit: captureSettings.sampleLimit,
      now: () => new Date(this.now()),
    });
    this.capture = capture;
    this.tasks.spawn('audio_capture', () => capture.run());
  }

  private transition(next: CallState): boolean {
    if (this.state === next) return false;
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      log.warn(
        { ...this.logContext, event: 'call_state_transition_rejected', from: this.state, to: next },
        'call state transition rejected',
      );
      return false;
    }
    log.info({ ...this.logContext, event: 'call_state_changed', from: this.state, to: next }, 'call state changed');
    this.state = next;
    return true;
  }

  private async performTeardown(reason: TeardownReason): Promise<void> {
    log.info({ ...this.logContext, event: 'call_teardown_started', reason, state: this.state }, 'call teardown started');
    this.queue.close();
    this.timeoutTask?.cancel();

    let faulted = false;
    try {
      const captureSummary = await this.closeCapture();

      if (this.egressId && this.recordings) {
        await this.recordings.stop(this.egressId);
      }

      if (this.tracker.getConnectionStatus() === null) {
        // Torn down before the callee answered.
        this.markNotConnected('FAILED');
        await this.persistence.recordCallFailed(this.callId, DISPOSITION_LABELS.FAILED, reason);
      }
      const connected = this.tracker.getConnectionStatus() === 'CONNECTED';

      if (connected && !this.dispositionForced) {
        const disposition = this.tracker.updateDisposition();
        log.info({ ...this.logContext, event: 'final_disposition', disposition }, 'final disposition');
      }

      if (this.egressId && this.recordings) {
        this.recordingJob = await this.recordings.finalize(this.egressId, this.settings.recordingGraceMs);
      }

      const snapshot = this.tracker.getFinalDisposition();
      if (connected) {
        const recording = this.recordingJob?.fileUrl ?? this.recordingJob?.filePath ?? null;
        await this.persistence.recordCallCompleted(
          this.callId,
          snapshot,
          snapshot.transcript,
          snapshot.callDurationSeconds,
          recording,
        );
      }

      await this.writeArtifacts(captureSummary);
      await this.deleteRoom();
      await this.closeVoice(reason);

      if (connected) {
        this.transition('COMPLETED');
      }
    } catch (error) {
      faulted = true;
      log.error({ ...this.logContext, err: error, event: 'call_teardown_failed', reason }, 'call teardown failed');
      this.transition('FAILED');
    }

    this.tasks.cancelAll();
    await this.tasks.join(this.settings.teardownJoinTimeoutMs);

    const snapshot = this.tracker.getFinalDisposition();
    recordCallMetrics({
      reason,
      connectionStatus: snapshot.connectionStatus,
      disposition: snapshot.disposition,
      durationSeconds: snapshot.callDurationSeconds,
    });
    log.info(
      {
        ...this.logContext,
        event: 'call_teardown_complete',
        reason,
        state: this.state,
        faulted,
        disposition: snapshot.disposition,
        connection_status: snapshot.connectionStatus,
        duration_seconds: snapshot.callDurationSeconds,
      },
      'call teardown complete',
    );
    this.onFinished?.(this);
  }

  private async closeCapture(): Promise<CaptureSummary | null> {
    const capture = this.capture;
    if (!capture) return null;
    try {
      return await capture.close();
    } catch (error) {
      log.warn({ ...this.logContext, err: error, event: 'audio_capture_close_failed' }, 'audio capture close failed');
      return capture.summary();
    }
  }

  private async writeArtifacts(captureSummary: CaptureSummary | null): Promise<void> {
    const baseDir = this.settings.artifactsDir;
    if (!baseDir) return;
    const filePath = transcriptArtifactPath(baseDir, this.roomName, this.startedAt);
    try {
      await writeTranscriptArtifact(
        filePath,
        buildTranscriptArtifact({
          roomName: this.roomName,
          phoneNumber: this.dialInfo.phoneNumber,
          snapshot: this.tracker.getFinalDisposition(),
          frameSample: captureSummary?.sample ?? [],
          callStart: this.startedAt,
          callEnd: new Date(this.now()),
        }),
      );
      log.info({ ...this.logContext, event: 'transcript_artifact_written', file_path: filePath }, 'transcript saved');
    } catch (error) {
      log.warn({ ...this.logContext, err: error, event: 'transcript_artifact_failed', file_path: filePath }, 'transcript save failed');
    }
  }

  private async deleteRoom(): Promise<void> {
    try {
      await this.platform.rooms.deleteRoom(this.roomName);
    } catch (error) {
      log.warn({ ...this.logContext, err: error, event: 'room_delete_failed' }, 'room delete failed');
    }
  }

  private async closeVoice(reason: TeardownReason): Promise<void> {
    try {
      await this.voice.close(reason);
    } catch (error) {
      log.warn({ ...this.logContext, err: error, event: 'voice_session_close_failed' }, 'voice session close failed');
    }
  }

  public getTeardownReason(): TeardownReason | null {
    return this.teardownReason;
  }
}
