import { classify } from './classifier';
import type { DispositionRuleSet } from './rules';
import {
  DISPOSITION_CONNECTION_MAP,
  type ConnectionStatus,
  type Disposition,
  type DispositionEvent,
  type DispositionSnapshot,
  type Speaker,
  type TranscriptItem,
} from './types';

/** Raised when a caller breaks the tracker's preconditions. Not recoverable. */
export class DispositionContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DispositionContractError';
  }
}

export interface DispositionTrackerOptions {
  rules: DispositionRuleSet;
  now?: () => number;
}

/**
 * Per-call accumulator of transcript items and disposition evaluations.
 * Single writer: the owning call session serializes every mutation.
 */
export class DispositionTracker {
  private readonly rules: DispositionRuleSet;
  private readonly now: () => number;
  private readonly startedAtMs: number;
  private readonly transcriptItems: TranscriptItem[] = [];
  private readonly history: DispositionEvent[] = [];
  private connectionStatus: ConnectionStatus | null = null;
  private connectedAtMs?: number;
  private currentDisposition: Disposition | null = null;

  constructor(options: DispositionTrackerOptions) {
    this.rules = options.rules;
    this.now = options.now ?? Date.now;
    this.startedAtMs = this.now();
  }

  /** Precondition: called once per call. */
  public setConnectionStatus(connected: boolean): void {
    if (this.connectionStatus !== null) {
      throw new DispositionContractError(
        `connection status already set to ${this.connectionStatus}`,
      );
    }

    const status: ConnectionStatus = connected ? 'CONNECTED' : 'NOT_CONNECTED';
    if (this.currentDisposition && DISPOSITION_CONNECTION_MAP[this.currentDisposition] !== status) {
      throw new DispositionContractError(
        `disposition ${this.currentDisposition} already recorded, cannot mark call ${status}`,
      );
    }

    this.connectionStatus = status;
    if (connected) {
      this.connectedAtMs = this.now();
    }
  }

  public addTranscriptItem(speaker: Speaker, text: string): void {
    this.transcriptItems.push({
      speaker,
      text,
      timestamp: new Date(this.now()).toISOString(),
    });
  }

  /**
   * Records a forced disposition, or classifies the transcript so far. Every
   * call appends to the history, repeated values included.
   */
  public updateDisposition(force?: Disposition): Disposition {
    const next = force ?? classify(this.transcriptItems, this.elapsedSeconds(), this.rules);

    if (this.connectionStatus !== null && DISPOSITION_CONNECTION_MAP[next] !== this.connectionStatus) {
      throw new DispositionContractError(
        `disposition ${next} requires ${DISPOSITION_CONNECTION_MAP[next]}, call is ${this.connectionStatus}`,
      );
    }

    this.currentDisposition = next;
    this.history.push({ timestamp: new Date(this.now()).toISOString(), disposition: next });
    return next;
  }

  public getConnectionStatus(): ConnectionStatus | null {
    return this.connectionStatus;
  }

  public getConnectedAt(): Date | undefined {
    return this.connectedAtMs === undefined ? undefined : new Date(this.connectedAtMs);
  }

  public getCurrentDisposition(): Disposition | null {
    return this.currentDisposition;
  }

  public getTranscript(): TranscriptItem[] {
    return this.transcriptItems.map((item) => ({ ...item }));
  }

  public elapsedSeconds(): number {
    return Math.max(0, (this.now() - this.startedAtMs) / 1000);
  }

  public getFinalDisposition(): DispositionSnapshot {
    return {
      disposition: this.currentDisposition,
      connectionStatus: this.connectionStatus,
      history: this.history.map((event) => ({ ...event })),
      transcript: this.getTranscript(),
      callDurationSeconds: this.elapsedSeconds(),
    };
  }
}
