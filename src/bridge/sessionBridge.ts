import { randomUUID } from 'crypto';
import { log } from '../log';
import type { AgentDispatcher, VoiceSession } from '../platform/types';
import { parseSessionEvent, type BridgeCommand, type SessionEvent } from './events';

const DEFAULT_ACK_TIMEOUT_MS = 30_000;

export interface BridgeSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

interface PendingAck {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface BridgeVoiceSessionOptions {
  callId: string;
  roomName: string;
  dispatcher: AgentDispatcher;
  metadata: Record<string, unknown>;
  startTimeoutMs: number;
  ackTimeoutMs?: number;
}

/**
 * Voice session backed by the speech agent's bridge socket. The agent is
 * dispatched into the room on start() and connects back to the runtime; the
 * session counts as started once that socket is attached.
 */
export class BridgeVoiceSession implements VoiceSession {
  public readonly callId: string;
  private readonly roomName: string;
  private readonly dispatcher: AgentDispatcher;
  private readonly metadata: Record<string, unknown>;
  private readonly startTimeoutMs: number;
  private readonly ackTimeoutMs: number;
  private readonly eventListeners: Array<(event: SessionEvent) => void> = [];
  private readonly audioListeners: Array<(frame: Buffer) => void> = [];
  private readonly pending = new Map<string, PendingAck>();
  private socket?: BridgeSocket;
  private attachWaiter?: { resolve: () => void; reject: (error: Error) => void };
  private closed = false;

  constructor(options: BridgeVoiceSessionOptions) {
    this.callId = options.callId;
    this.roomName = options.roomName;
    this.dispatcher = options.dispatcher;
    this.metadata = options.metadata;
    this.startTimeoutMs = options.startTimeoutMs;
    this.ackTimeoutMs = options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS;
  }

  public async start(): Promise<void> {
    if (this.closed) {
      throw new Error('voice session closed before start');
    }
    await Promise.all([
      this.waitForAttach(),
      this.dispatcher.dispatch(this.roomName, { ...this.metadata, call_id: this.callId }),
    ]);
    log.info(
      { event: 'voice_session_started', call_id: this.callId, room: this.roomName },
      'voice session started',
    );
  }

  public onEvent(listener: (event: SessionEvent) => void): void {
    this.eventListeners.push(listener);
  }

  public onAudioFrame(listener: (frame: Buffer) => void): void {
    this.audioListeners.push(listener);
  }

  public say(instructions: string): Promise<void> {
    return this.request({ type: 'say', id: randomUUID(), instructions });
  }

  public waitForPlayout(): Promise<void> {
    return this.request({ type: 'wait_playout', id: randomUUID() });
  }

  public sendToolResult(toolCallId: string, output: string): void {
    this.send({ type: 'tool_result', id: toolCallId, output });
  }

  public async close(reason: string): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timer);
      pending.reject(new Error(`voice session closed before ack ${id}`));
    }
    this.pending.clear();
    this.attachWaiter?.reject(new Error(`voice session closed: ${reason}`));
    this.attachWaiter = undefined;

    const socket = this.socket;
    this.socket = undefined;
    if (socket) {
      try {
        socket.close(1000, reason);
      } catch (error) {
        log.warn({ err: error, call_id: this.callId }, 'bridge socket close failed');
      }
    }
  }

  public isAttached(): boolean {
    return this.socket !== undefined;
  }

  /** Returns false when the session is closed or another socket already holds it. */
  public attach(socket: BridgeSocket): boolean {
    if (this.closed || this.socket) {
      return false;
    }
    this.socket = socket;
    this.attachWaiter?.resolve();
    this.attachWaiter = undefined;
    return true;
  }

  public detach(socket: BridgeSocket): void {
    if (this.socket !== socket) {
      return;
    }
    this.socket = undefined;
    if (!this.closed) {
      this.emit({ type: 'close', reason: 'bridge_disconnected' });
    }
  }

  public handleMessage(data: Buffer | string, isBinary: boolean): void {
    if (this.closed) {
      return;
    }

    if (isBinary && Buffer.isBuffer(data)) {
      for (const listener of this.audioListeners) {
        listener(data);
      }
      return;
    }

    const event = parseSessionEvent(data.toString());
    if (!event) {
      log.warn({ event: 'bridge_message_invalid', call_id: this.callId }, 'invalid bridge message');
      return;
    }

    if (event.type === 'ack') {
      const pending = this.pending.get(event.id);
      if (!pending) {
        return;
      }
      this.pending.delete(event.id);
      clearTimeout(pending.timer);
      if (event.ok) {
        pending.resolve();
      } else {
        pending.reject(new Error(event.error ?? `agent rejected ${event.id}`));
      }
      return;
    }

    this.emit(event);
  }

  private emit(event: SessionEvent): void {
    for (const listener of this.eventListeners) {
      listener(event);
    }
  }

  private waitForAttach(): Promise<void> {
    if (this.socket) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.attachWaiter = undefined;
        reject(new Error(`voice session not attached within ${this.startTimeoutMs}ms`));
      }, this.startTimeoutMs);
      this.attachWaiter = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  private request(command: Exclude<BridgeCommand, { type: 'tool_result' }>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.socket || this.closed) {
        reject(new Error('voice session not attached'));
        return;
      }
      const timer = setTimeout(() => {
        this.pending.delete(command.id);
        reject(new Error(`bridge ${command.type} timed out`));
      }, this.ackTimeoutMs);
      this.pending.set(command.id, { resolve, reject, timer });
      this.send(command);
    });
  }

  private send(command: BridgeCommand): void {
    if (!this.socket) {
      log.warn(
        { event: 'bridge_send_skipped', call_id: this.callId, command: command.type },
        'bridge send skipped - no socket',
      );
      return;
    }
    this.socket.send(JSON.stringify(command));
  }
}
