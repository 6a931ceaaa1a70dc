import { IExecutionPool, PoolStats, PoolTask, PoolWorker } from '../../core/interfaces/IExecutionPool.js';
import { JobOutcome } from '../../core/entities/ClassificationJob.js';
import { PoolExhaustedError } from '../../core/errors.js';

export interface PoolOptions {
  maxWorkers?: number;
  maxPending?: number;
}

/**
 * A task waiting for (or running on) a worker. `settle` is effective once.
 */
export interface QueuedTask {
  task: PoolTask;
  settle: (outcome: JobOutcome) => void;
  detachCancel: () => void;
}

/**
 * FIFO queue, admission control and idle tracking shared by the pools.
 * Subclasses decide how a task runs.
 */
export abstract class BaseExecutionPool implements IExecutionPool {
  readonly maxWorkers: number;
  protected readonly maxPending: number;
  protected pending: QueuedTask[] = [];
  protected accepting = true;
  private idleWaiters: Array<() => void> = [];

  constructor(options: PoolOptions = {}) {
    this.maxWorkers = Math.max(1, options.maxWorkers ?? 1);
    this.maxPending = Math.max(0, options.maxPending ?? 1000);
  }

  abstract liveWorkers(): PoolWorker[];

  protected abstract busyCount(): number;

  /**
   * Start as many queued tasks as free workers allow
   */
  protected abstract dispatch(): void;

  /**
   * True when nothing is running and no worker needs to wind down
   */
  protected abstract isIdle(): boolean;

  protected abstract get mode(): PoolStats['mode'];

  canAccept(): boolean {
    return this.accepting && this.hasRoom();
  }

  /**
   * A task that can start on a free worker never counts against `maxPending`
   */
  private hasRoom(): boolean {
    const waiting = this.pending.length;
    return waiting < this.maxPending || this.busyCount() + waiting < this.maxWorkers;
  }

  submit(task: PoolTask): Promise<JobOutcome> {
    if (!this.accepting) {
      return Promise.reject(new Error('Execution pool is shut down'));
    }
    if (!this.hasRoom()) {
      return Promise.reject(new PoolExhaustedError(this.pending.length));
    }

    return new Promise<JobOutcome>((resolve) => {
      let settled = false;
      const queued: QueuedTask = {
        task,
        settle: (outcome) => {
          if (settled) return;
          settled = true;
          resolve(outcome);
        },
        detachCancel: () => {},
      };

      this.pending.push(queued);
      queued.detachCancel = task.token.onCancel(() => this.dropQueued(queued));
      this.dispatch();
    });
  }

  shutdown(): void {
    this.accepting = false;
    const dropped = this.pending;
    this.pending = [];
    for (const queued of dropped) {
      queued.detachCancel();
      queued.settle({ status: 'aborted', log: 'Cancelled before start: execution pool shut down\n' });
    }
    this.notifyIfIdle();
  }

  waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.isIdle()) {
      return Promise.resolve(true);
    }

    return new Promise((resolve) => {
      const waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter((w) => w !== waiter);
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.push(waiter);
    });
  }

  stats(): PoolStats {
    return {
      mode: this.mode,
      maxWorkers: this.maxWorkers,
      busy: this.busyCount(),
      pending: this.pending.length,
      accepting: this.accepting,
    };
  }

  /**
   * Remove the next queued task, detaching its queue-time cancel listener
   */
  protected takeNext(): QueuedTask | undefined {
    const queued = this.pending.shift();
    queued?.detachCancel();
    return queued;
  }

  protected notifyIfIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  private dropQueued(queued: QueuedTask): void {
    const index = this.pending.indexOf(queued);
    if (index === -1) return;
    this.pending.splice(index, 1);
    queued.settle({ status: 'aborted', log: 'Cancelled before start\n' });
  }
}
