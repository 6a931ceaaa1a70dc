import { PoolStats, PoolWorker } from '../../core/interfaces/IExecutionPool.js';
import { IClassifierBackend } from '../../core/interfaces/IClassifierBackend.js';
import { JobOutcome } from '../../core/entities/ClassificationJob.js';
import { errorMessage } from '../../core/errors.js';
import { runClassificationJob } from '../../application/jobs/runClassificationJob.js';
import { createLogger } from '../logging/logger.js';
import { BaseExecutionPool, PoolOptions, QueuedTask } from './BaseExecutionPool.js';

const logger = createLogger('InlinePool');

/**
 * A slot running one job body on the event loop. A promise cannot be
 * preempted, so terminating a slot abandons the body: the task settles as
 * aborted immediately and whatever the body returns later is dropped.
 */
class InlineWorker implements PoolWorker {
  private alive = true;

  constructor(
    readonly id: string,
    readonly queued: QueuedTask,
    private onRelease: (worker: InlineWorker) => void
  ) {}

  isAlive(): boolean {
    return this.alive;
  }

  finish(outcome: JobOutcome): void {
    if (!this.alive) return;
    this.alive = false;
    this.queued.settle(outcome);
    this.onRelease(this);
  }

  terminate(): void {
    this.abandon('terminated');
  }

  kill(): void {
    this.abandon('killed');
  }

  private abandon(how: string): void {
    if (!this.alive) return;
    this.queued.task.token.requestCancel();
    logger.warn(`Worker ${this.id} ${how} while running job ${this.queued.task.jobId}`);
    this.finish({ status: 'aborted', log: `Worker ${this.id} ${how} before the job finished\n` });
  }
}

/**
 * Runs job bodies in this process, at most `maxWorkers` at a time, against
 * a shared backend
 */
export class InlineExecutionPool extends BaseExecutionPool {
  private running: Map<string, InlineWorker> = new Map();
  private workerSeq = 0;

  constructor(
    private backend: IClassifierBackend,
    options: PoolOptions = {}
  ) {
    super(options);
  }

  protected get mode(): PoolStats['mode'] {
    return 'inline';
  }

  liveWorkers(): PoolWorker[] {
    return Array.from(this.running.values()).filter((worker) => worker.isAlive());
  }

  protected busyCount(): number {
    return this.running.size;
  }

  protected isIdle(): boolean {
    return this.running.size === 0;
  }

  protected dispatch(): void {
    while (this.running.size < this.maxWorkers && this.pending.length > 0) {
      const queued = this.takeNext();
      if (!queued) break;

      const worker = new InlineWorker(`inline-${++this.workerSeq}`, queued, (done) => this.release(done));
      this.running.set(worker.id, worker);
      void this.execute(worker);
    }
  }

  private async execute(worker: InlineWorker): Promise<void> {
    const { task } = worker.queued;
    let outcome: JobOutcome;
    try {
      outcome = await runClassificationJob(
        { jobId: task.jobId, items: task.items, categories: task.categories },
        this.backend,
        task.token,
        (processed) => {
          if (worker.isAlive()) task.onProgress(processed);
        }
      );
    } catch (error) {
      outcome = { status: 'failed', error: errorMessage(error), log: '' };
    }
    worker.finish(outcome);
  }

  private release(worker: InlineWorker): void {
    this.running.delete(worker.id);
    if (this.accepting) {
      this.dispatch();
    }
    this.notifyIfIdle();
  }
}
