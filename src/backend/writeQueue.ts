import { logger } from '@shared/logger';

type PendingTask = {
  label: string;
  run: () => unknown;
  resolve: (value: unknown) => void;
  reject: (error: unknown) => void;
};

/**
 * Runs mutating database work one task at a time, off the caller's stack.
 * Ordering is FIFO; a failing task rejects its own promise and the queue moves on.
 */
export class SerialWriteQueue {
  private pending: PendingTask[] = [];
  private running = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  enqueue<T>(label: string, task: () => T): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error(`Write queue is closed; dropped "${label}"`));
    }
    return new Promise<T>((resolve, reject) => {
      this.pending.push({
        label,
        run: task,
        resolve: (value) => resolve(value as T),
        reject
      });
      this.schedule();
    });
  }

  get size() {
    return this.pending.length + (this.running ? 1 : 0);
  }

  /**
   * Stops accepting work and waits up to `timeoutMs` for queued tasks to finish.
   * Tasks still queued after the bound are abandoned. Resolves true when everything ran.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.closed = true;
    if (this.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const finished = await Promise.race([
      new Promise<boolean>((resolve) => this.idleWaiters.push(() => resolve(true))),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      })
    ]);
    if (timer) clearTimeout(timer);

    if (!finished) {
      const abandoned = this.pending.splice(0);
      logger.warn(`Write queue did not drain within ${timeoutMs}ms; abandoning ${abandoned.length} task(s)`);
      for (const task of abandoned) {
        task.reject(new Error(`Write abandoned at shutdown: ${task.label}`));
      }
    }
    return finished;
  }

  private schedule() {
    if (this.running) return;
    this.running = true;
    setImmediate(() => this.runNext());
  }

  private runNext() {
    const task = this.pending.shift();
    if (!task) {
      this.running = false;
      const waiters = this.idleWaiters.splice(0);
      waiters.forEach((notify) => notify());
      return;
    }
    try {
      task.resolve(task.run());
    } catch (error) {
      task.reject(error);
    }
    setImmediate(() => this.runNext());
  }
}
