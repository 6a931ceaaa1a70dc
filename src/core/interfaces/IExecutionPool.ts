import { JobOutcome } from '../entities/ClassificationJob.js';
import { CancellationToken } from '../cancellation/CancellationToken.js';

/**
 * Unit of work handed to the pool, one per job
 */
export interface PoolTask {
  jobId: string;
  items: string[];
  categories: string[];
  token: CancellationToken;
  onProgress: (processed: number) => void;
}

/**
 * An execution unit the shutdown sequence can escalate against
 */
export interface PoolWorker {
  readonly id: string;
  readonly pid?: number;
  isAlive(): boolean;
  /**
   * Ask the worker to stop (SIGTERM for a process)
   */
  terminate(): void;
  /**
   * Stop the worker unconditionally (SIGKILL for a process)
   */
  kill(): void;
}

export interface PoolStats {
  mode: 'inline' | 'process';
  maxWorkers: number;
  busy: number;
  pending: number;
  accepting: boolean;
}

export interface IExecutionPool {
  readonly maxWorkers: number;

  /**
   * False once shut down or when the pending queue is full
   */
  canAccept(): boolean;

  /**
   * Queue a job body. The promise settles exactly once per task.
   */
  submit(task: PoolTask): Promise<JobOutcome>;

  /**
   * Refuse new tasks and settle queued ones as aborted
   */
  shutdown(): void;

  /**
   * Resolve true once no worker is alive or busy, false on timeout
   */
  waitForIdle(timeoutMs: number): Promise<boolean>;

  liveWorkers(): PoolWorker[];

  stats(): PoolStats;
}
