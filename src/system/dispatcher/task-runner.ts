/**
 * Bounded-concurrency runner for fire-and-forget work.
 * Tasks beyond the limit wait in FIFO order; none are dropped.
 */

import { RelayLogger, createModuleLogger } from '../logger';

interface QueuedTask {
  name: string;
  run: () => Promise<void>;
}

export class TaskRunner {
  private queue: QueuedTask[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly maxConcurrent: number;
  private readonly logger: RelayLogger;

  constructor(maxConcurrent: number, logger: RelayLogger = createModuleLogger('task-runner')) {
    this.maxConcurrent = Math.max(1, maxConcurrent);
    this.logger = logger;
  }

  submit(name: string, run: () => Promise<void>): void {
    this.queue.push({ name, run });
    this.drain();
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /**
   * Resolves once nothing is running or queued, or after `timeoutMs`.
   * Returns false on timeout.
   */
  onIdle(timeoutMs?: number): Promise<boolean> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve(true);
    }

    return new Promise(resolve => {
      let timer: NodeJS.Timeout | undefined;
      const waiter = (): void => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(true);
      };
      this.idleWaiters.push(waiter);

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.idleWaiters = this.idleWaiters.filter(entry => entry !== waiter);
          resolve(false);
        }, timeoutMs);
      }
    });
  }

  private drain(): void {
    while (this.running < this.maxConcurrent && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) {
        break;
      }
      this.running++;
      void this.execute(task);
    }

    if (this.running === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(waiter => waiter());
    }
  }

  private async execute(task: QueuedTask): Promise<void> {
    try {
      await task.run();
    } catch (error) {
      this.logger.error(`Task ${task.name} failed`, error instanceof Error ? error : new Error(String(error)));
    } finally {
      this.running--;
      this.drain();
    }
  }
}
