import { ILogger, ITaskPool, PoolTask, TaskOutcome, TaskPoolStats } from '../interfaces/services';
import { ServiceUnavailableError } from '../errors/AppError';

export interface TaskPoolOptions {
  concurrency: number;
  maxQueue: number;
}

type QueuedTask = {
  name: string;
  execute: () => Promise<boolean>;
};

// Bounded in-process worker pool for everything that runs after the HTTP
// response has gone out: async analysis and callback delivery.
// A slot is held until the task's onSettled handler has finished, so work
// submitted from that handler is already queued when the slot frees up.
export class TaskPool implements ITaskPool {
  private queue: QueuedTask[] = [];
  private active = 0;
  private completed = 0;
  private failed = 0;
  private accepting = true;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private logger: ILogger,
    private options: TaskPoolOptions
  ) {}

  submit<T>(task: PoolTask<T>): void {
    if (!this.accepting) {
      throw new ServiceUnavailableError('Task pool is shutting down');
    }
    if (this.isSaturated()) {
      throw new ServiceUnavailableError('Task pool queue is full');
    }

    this.queue.push({ name: task.name, execute: () => this.runTask(task) });
    this.logger.debug('Task queued', { task: task.name, queued: this.queue.length, active: this.active });
    this.drainQueue();
  }

  isSaturated(): boolean {
    return this.active >= this.options.concurrency && this.queue.length >= this.options.maxQueue;
  }

  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  getStats(): TaskPoolStats {
    return {
      active: this.active,
      queued: this.queue.length,
      completed: this.completed,
      failed: this.failed
    };
  }

  // Stops new submissions and waits for what is already queued or running
  async shutdown(): Promise<void> {
    this.accepting = false;
    this.logger.info('Task pool draining', this.getStats());
    await this.onIdle();
    this.logger.info('Task pool drained', this.getStats());
  }

  private drainQueue(): void {
    while (this.active < this.options.concurrency) {
      const next = this.queue.shift();
      if (!next) break;

      this.active++;
      void next.execute()
        .then((succeeded) => {
          if (succeeded) {
            this.completed++;
          } else {
            this.failed++;
          }
        })
        .finally(() => {
          this.active--;
          this.drainQueue();
          this.notifyIfIdle();
        });
    }
  }

  // Resolves with whether run() succeeded; never rejects
  private async runTask<T>(task: PoolTask<T>): Promise<boolean> {
    let outcome: TaskOutcome<T>;
    try {
      outcome = { ok: true, value: await task.run() };
    } catch (error) {
      outcome = { ok: false, error };
    }

    try {
      await task.onSettled(outcome);
    } catch (error) {
      this.logger.error(`Completion handler for task ${task.name} failed`, error);
      return false;
    }

    return outcome.ok;
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach((resolve) => resolve());
  }
}
