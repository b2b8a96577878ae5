import { log } from '../log';

export interface WorkItem {
  name: string;
  run: () => Promise<void> | void;
}

/**
 * Runs work items one at a time in arrival order. A failing item is logged
 * and the queue moves on.
 */
export class SerialQueue {
  private readonly items: WorkItem[] = [];
  private running = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly logContext: Record<string, unknown> = {}) {}

  public get pending(): number {
    return this.items.length;
  }

  public enqueue(item: WorkItem): boolean {
    if (this.closed) {
      log.warn(
        { ...this.logContext, event: 'work_item_dropped_closed', task: item.name },
        'work item dropped - queue closed',
      );
      return false;
    }

    this.items.push(item);
    if (!this.running) {
      this.running = true;
      setImmediate(() => {
        void this.drain();
      });
    }
    return true;
  }

  /** Drops pending items and refuses new ones. An item already running completes. */
  public close(): void {
    this.closed = true;
    this.items.length = 0;
  }

  /** Resolves once no item is running or pending. */
  public onIdle(): Promise<void> {
    if (!this.running && this.items.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async drain(): Promise<void> {
    while (this.items.length > 0) {
      const item = this.items.shift();
      if (!item) {
        continue;
      }

      try {
        await item.run();
      } catch (error) {
        log.error({ ...this.logContext, err: error, event: 'work_item_failed', task: item.name }, 'work item failed');
      }
    }

    this.running = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
