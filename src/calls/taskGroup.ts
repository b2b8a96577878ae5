import { log } from '../log';

export interface TaskHandle {
  name: string;
  signal: AbortSignal;
  cancel(): void;
  done: Promise<void>;
}

/**
 * Owns the background tasks of one call. Every task gets an AbortSignal and
 * is awaited on join, so nothing outlives the call unobserved.
 */
export class TaskGroup {
  private readonly tasks = new Set<TaskHandle>();

  constructor(private readonly logContext: Record<string, unknown> = {}) {}

  public get size(): number {
    return this.tasks.size;
  }

  public spawn(name: string, run: (signal: AbortSignal) => Promise<void>): TaskHandle {
    const controller = new AbortController();
    const handle: TaskHandle = {
      name,
      signal: controller.signal,
      cancel: () => controller.abort(),
      done: Promise.resolve(),
    };

    handle.done = Promise.resolve()
      .then(() => run(controller.signal))
      .catch((error: unknown) => {
        log.error({ ...this.logContext, err: error, event: 'task_failed', task: name }, 'background task failed');
      })
      .finally(() => {
        this.tasks.delete(handle);
      });

    this.tasks.add(handle);
    return handle;
  }

  public cancelAll(): void {
    for (const task of this.tasks) {
      task.cancel();
    }
  }

  /**
   * Waits for every task, `except` the caller's own, up to `timeoutMs`.
   * Returns the names of tasks still running when the timeout fired.
   */
  public async join(timeoutMs: number, except?: TaskHandle): Promise<string[]> {
    const pending = Array.from(this.tasks).filter((task) => task !== except);
    if (pending.length === 0) {
      return [];
    }

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const result = await Promise.race([Promise.all(pending.map((task) => task.done)), timedOut]);
    if (timer) {
      clearTimeout(timer);
    }

    if (result !== 'timeout') {
      return [];
    }
    const stragglers = pending.filter((task) => this.tasks.has(task)).map((task) => task.name);
    log.warn(
      { ...this.logContext, event: 'task_join_timeout', tasks: stragglers, timeout_ms: timeoutMs },
      'tasks still running after join timeout',
    );
    return stragglers;
  }
}

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
