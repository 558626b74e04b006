import { WorkerPoolStatsDto } from '@pr-sentinel/shared';
import { CapacityError, ShuttingDownError } from '../../domain/errors';

export interface WorkerPoolConfig {
  core: number;
  max: number;
  queueCapacity: number;
}

/**
 * Runs async tasks with bounded concurrency and a bounded wait queue.
 *
 * Admission order for a new task:
 *  1. fewer than `core` running: start it
 *  2. queue has room: enqueue it
 *  3. fewer than `max` running: start it
 *  4. otherwise reject with CapacityError
 *
 * A finishing task hands its slot to the oldest queued one.
 */
export class BoundedWorkerPool {
  private running = 0;
  private completed = 0;
  private closed = false;
  private readonly queue: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly config: WorkerPoolConfig) {
    if (config.core < 1 || config.max < config.core || config.queueCapacity < 0) {
      throw new Error(
        `Invalid worker pool sizing: core=${config.core} max=${config.max} queue=${config.queueCapacity}`,
      );
    }
  }

  get isShuttingDown(): boolean {
    return this.closed;
  }

  /** Whether a task submitted now would be admitted. */
  hasCapacity(): boolean {
    return (
      !this.closed &&
      (this.running < this.config.max || this.queue.length < this.config.queueCapacity)
    );
  }

  /**
   * Admits the task or throws synchronously. The returned promise settles
   * with the task's own outcome.
   */
  submit<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new ShuttingDownError();
    }
    if (this.running < this.config.core) {
      return this.run(task);
    }
    if (this.queue.length < this.config.queueCapacity) {
      return new Promise<T>((resolve, reject) => {
        this.queue.push(() => {
          this.run(task).then(resolve, reject);
        });
      });
    }
    if (this.running < this.config.max) {
      return this.run(task);
    }
    throw new CapacityError(this.config.queueCapacity);
  }

  stats(): WorkerPoolStatsDto {
    return {
      core: this.config.core,
      max: this.config.max,
      running: this.running,
      queued: this.queue.length,
      queueCapacity: this.config.queueCapacity,
      completed: this.completed,
    };
  }

  /**
   * Stops admitting work and resolves once running and queued tasks are done.
   */
  shutdown(): Promise<void> {
    this.closed = true;
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private run<T>(task: () => Promise<T>): Promise<T> {
    this.running++;
    return Promise.resolve()
      .then(task)
      .finally(() => {
        this.running--;
        this.completed++;
        this.drain();
      });
  }

  private drain(): void {
    while (this.queue.length > 0 && this.running < this.config.max) {
      const next = this.queue.shift();
      if (next) {
        next();
      }
    }
    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }
}
