import { IJobRegistry } from '../../core/interfaces/IJobRegistry.js';
import { IExecutionPool } from '../../core/interfaces/IExecutionPool.js';
import {
  CancelReceipt,
  JobLogView,
  JobOutcome,
  JobRecord,
  JobResultsView,
  JobSnapshot,
  JobStatus,
  JobUpdateEvent,
  NewJob,
  ServiceHealth,
  SubmitReceipt,
  isTerminalStatus,
} from '../../core/entities/ClassificationJob.js';
import {
  InvalidJobStateError,
  InvalidRequestError,
  JobNotFoundError,
  PoolExhaustedError,
  ShuttingDownError,
  errorMessage,
} from '../../core/errors.js';
import { CancellationDirectory } from '../../infrastructure/cancellation/CancellationDirectory.js';
import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('Orchestrator');

export const DEFAULT_MAX_BATCH_SIZE = 100;

export interface OrchestratorOptions {
  maxBatchSize?: number;
}

export type JobUpdateListener = (event: JobUpdateEvent) => void;

/**
 * Front door for classification jobs: validates submissions, owns the
 * state machine, dispatches bodies to the pool and applies their outcomes.
 *
 *   queued -> processing -> completed | failed | aborted
 *   queued -> aborted
 *
 * Aborted is sticky: an outcome arriving after a cancel or a shutdown never
 * replaces it.
 */
export class JobOrchestrator {
  private readonly maxBatchSize: number;
  private shuttingDown = false;
  private inflight: Map<string, Promise<void>> = new Map();
  private listeners: Set<JobUpdateListener> = new Set();

  constructor(
    private registry: IJobRegistry,
    private cancellations: CancellationDirectory,
    private pool: IExecutionPool,
    options: OrchestratorOptions = {}
  ) {
    this.maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;
  }

  /**
   * Create a job, dispatch it, and return without waiting for the body
   */
  submit(request: NewJob): SubmitReceipt {
    if (this.shuttingDown) {
      throw new ShuttingDownError();
    }

    const { items, categories } = this.validate(request);

    if (!this.pool.canAccept()) {
      throw new PoolExhaustedError(this.pool.stats().pending);
    }

    const jobId = this.registry.create({ items, categories });
    const token = this.cancellations.create(jobId);

    this.registry.update(jobId, (record) => {
      record.status = 'processing';
      record.startedAt = new Date();
    });

    const completion = this.pool
      .submit({
        jobId,
        items,
        categories,
        token,
        onProgress: (processed) => this.applyProgress(jobId, processed),
      })
      .catch((error: unknown): JobOutcome => ({
        status: 'failed',
        error: `Execution pool error: ${errorMessage(error)}`,
        log: '',
      }))
      .then((outcome) => this.applyOutcome(jobId, outcome))
      .finally(() => this.inflight.delete(jobId));
    this.inflight.set(jobId, completion);

    logger.info(`Job ${jobId} dispatched (${items.length} items, ${categories.length} categories)`);
    this.emit(jobId, 'processing');

    return { id: jobId, status: 'processing', total: items.length };
  }

  /**
   * Completion step, run once per job. Only a non-terminal record is
   * written; a late outcome for an aborted job contributes its log at most.
   */
  applyOutcome(jobId: string, outcome: JobOutcome): void {
    this.cancellations.release(jobId);

    let applied = false;
    const record = this.registry.update(jobId, (draft) => {
      if (isTerminalStatus(draft.status)) {
        if (draft.log === undefined && outcome.log) {
          draft.log = outcome.log;
        }
        return;
      }

      applied = true;
      draft.status = outcome.status;
      draft.completedAt = new Date();
      draft.log = outcome.log;
      if (outcome.status === 'completed') {
        draft.results = outcome.results;
      } else if (outcome.status === 'failed') {
        draft.error = outcome.error;
      }
    });

    if (!record) {
      logger.debug(`Job ${jobId} finished after it was removed; outcome dropped`);
      return;
    }
    if (!applied) {
      logger.info(`Job ${jobId} already ${record.status}; late ${outcome.status} outcome ignored`);
      return;
    }

    if (outcome.status === 'failed') {
      logger.warn(`Job ${jobId} failed: ${outcome.error}`);
    } else {
      logger.info(`Job ${jobId} ${outcome.status}`);
    }
    this.emit(jobId, outcome.status);
  }

  applyProgress(jobId: string, processed: number): void {
    this.registry.update(jobId, (record) => {
      if (record.status !== 'processing' || record.total === 0) return;
      const ratio = Math.min(1, Math.max(0, processed / record.total));
      record.progress = Math.max(record.progress, ratio);
    });
  }

  /**
   * Request cancellation and mark the job aborted right away. The body stops
   * at its next item boundary.
   */
  cancel(jobId: string): CancelReceipt {
    const current = this.registry.get(jobId);
    if (!current) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminalStatus(current.status)) {
      throw new InvalidJobStateError(`Job already finished (status: ${current.status})`, current.status);
    }

    this.cancellations.signal(jobId);
    this.markAborted(jobId);
    logger.info(`Job ${jobId} cancelled`);

    return { id: jobId, status: 'aborted', message: 'Cancellation requested; job marked as aborted' };
  }

  query(jobId: string): JobSnapshot {
    const record = this.registry.get(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }
    return toSnapshot(record);
  }

  results(jobId: string): JobResultsView {
    const record = this.registry.get(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }
    if (record.status !== 'completed' || !record.results) {
      throw new InvalidJobStateError(`Job not completed yet (status: ${record.status})`, record.status);
    }

    return {
      id: record.id,
      results: record.results,
      total: record.total,
      categories: record.categories,
    };
  }

  log(jobId: string): JobLogView {
    const record = this.registry.get(jobId);
    if (!record) {
      throw new JobNotFoundError(jobId);
    }
    return { id: record.id, log: record.log ?? '' };
  }

  /**
   * Snapshots, newest first
   */
  list(status?: JobStatus): JobSnapshot[] {
    return this.registry
      .list()
      .filter((record) => !status || record.status === status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(toSnapshot);
  }

  health(): ServiceHealth {
    return {
      status: this.shuttingDown ? 'shutting_down' : 'healthy',
      activeJobCount: this.registry.listActive().length,
      totalJobCount: this.registry.size(),
    };
  }

  /**
   * Reject further submissions
   */
  beginShutdown(): void {
    this.shuttingDown = true;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Signal and force-abort every queued or processing job
   */
  abortOutstanding(reason: string): string[] {
    const aborted: string[] = [];
    for (const jobId of this.registry.listActive()) {
      this.cancellations.signal(jobId);
      if (this.markAborted(jobId)) {
        aborted.push(jobId);
      }
    }
    if (aborted.length > 0) {
      logger.warn(`Aborted ${aborted.length} outstanding job(s): ${reason}`);
    }
    return aborted;
  }

  /**
   * Resolve true once every dispatched job has had its outcome applied
   */
  async waitForSettled(timeoutMs: number): Promise<boolean> {
    if (this.inflight.size === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([
        Promise.all(this.inflight.values()).then(() => true),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  onJobUpdate(listener: JobUpdateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private markAborted(jobId: string): boolean {
    let changed = false;
    this.registry.update(jobId, (record) => {
      if (isTerminalStatus(record.status)) return;
      record.status = 'aborted';
      record.completedAt = new Date();
      changed = true;
    });
    if (changed) {
      this.emit(jobId, 'aborted');
    }
    return changed;
  }

  private validate(request: NewJob): NewJob {
    const { items, categories } = request;

    if (!Array.isArray(items) || items.length === 0) {
      throw new InvalidRequestError('Items and categories required');
    }
    if (!Array.isArray(categories) || categories.length === 0) {
      throw new InvalidRequestError('Items and categories required');
    }
    if (items.length > this.maxBatchSize) {
      throw new InvalidRequestError(`Maximum ${this.maxBatchSize} items allowed`);
    }
    if (items.some((item) => typeof item !== 'string' || item.trim() === '')) {
      throw new InvalidRequestError('Every item must be a non-empty string');
    }
    if (categories.some((category) => typeof category !== 'string' || category.trim() === '')) {
      throw new InvalidRequestError('Every category must be a non-empty string');
    }

    return { items: [...items], categories: Array.from(new Set(categories)) };
  }

  private emit(jobId: string, status: JobStatus): void {
    const event: JobUpdateEvent = { jobId, status, timestamp: new Date() };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`Job update listener failed: ${errorMessage(error)}`);
      }
    }
  }
}

function toSnapshot(record: JobRecord): JobSnapshot {
  const snapshot: JobSnapshot = { ...record };
  if (record.startedAt) {
    const end = record.completedAt ?? new Date();
    snapshot.duration = (end.getTime() - record.startedAt.getTime()) / 1000;
  }
  return snapshot;
}
