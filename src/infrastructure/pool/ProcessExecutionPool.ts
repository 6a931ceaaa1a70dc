import { fork } from 'child_process';
import path from 'path';
import { PoolStats, PoolWorker } from '../../core/interfaces/IExecutionPool.js';
import { JobOutcome } from '../../core/entities/ClassificationJob.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../logging/logger.js';
import { BaseExecutionPool, PoolOptions, QueuedTask } from './BaseExecutionPool.js';
import { ChildMessage, ChildMessageSchema, ParentMessage } from './protocol.js';

const logger = createLogger('ProcessPool');

/**
 * The slice of a forked child process the pool relies on
 */
export interface WorkerProcess {
  readonly pid?: number;
  send(message: ParentMessage): boolean;
  kill(signal: NodeJS.Signals): boolean;
  onMessage(listener: (message: unknown) => void): void;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type WorkerSpawner = () => WorkerProcess;

export const DEFAULT_WORKER_SCRIPT = path.join(__dirname, 'worker.js');

/**
 * Fork the worker entry point with an IPC channel
 */
export function forkWorkerProcess(scriptPath: string = DEFAULT_WORKER_SCRIPT): WorkerProcess {
  const child = fork(scriptPath, [], {
    // stdout stays free for the MCP stdio transport of the parent
    stdio: ['ignore', 'ignore', 'inherit', 'ipc'],
    env: process.env,
  });

  return {
    get pid() {
      return child.pid;
    },
    send: (message) => {
      if (!child.connected) return false;
      // A false return from send() only means backpressure; delivery still happens
      child.send(message, (error) => {
        if (error) logger.warn(`IPC send to pid ${child.pid} failed: ${error.message}`);
      });
      return true;
    },
    kill: (signal) => child.kill(signal),
    onMessage: (listener) => {
      child.on('message', listener);
    },
    onExit: (listener) => {
      child.on('exit', listener);
    },
    onError: (listener) => {
      child.on('error', listener);
    },
  };
}

interface Assignment {
  queued: QueuedTask;
  detachCancel: () => void;
}

class ProcessWorker implements PoolWorker {
  current: Assignment | null = null;
  private exited = false;

  constructor(
    readonly id: string,
    private proc: WorkerProcess
  ) {}

  get pid(): number | undefined {
    return this.proc.pid;
  }

  isAlive(): boolean {
    return !this.exited;
  }

  markExited(): void {
    this.exited = true;
  }

  send(message: ParentMessage): boolean {
    if (this.exited) return false;
    try {
      return this.proc.send(message);
    } catch (error) {
      logger.warn(`Could not send "${message.type}" to ${this.id}: ${errorMessage(error)}`);
      return false;
    }
  }

  terminate(): void {
    if (!this.isAlive()) return;
    logger.warn(`Sending SIGTERM to ${this.id} (pid ${this.pid ?? 'unknown'})`);
    this.signal('SIGTERM');
  }

  kill(): void {
    if (!this.isAlive()) return;
    logger.warn(`Sending SIGKILL to ${this.id} (pid ${this.pid ?? 'unknown'})`);
    this.signal('SIGKILL');
  }

  private signal(signal: NodeJS.Signals): void {
    try {
      this.proc.kill(signal);
    } catch (error) {
      logger.error(`${signal} to ${this.id} failed: ${errorMessage(error)}`);
    }
  }
}

export interface ProcessPoolOptions extends PoolOptions {
  spawn?: WorkerSpawner;
}

/**
 * Runs each job body in a forked worker process, one job per process at a
 * time. Processes are started on demand, reused, and replaced after a crash.
 */
export class ProcessExecutionPool extends BaseExecutionPool {
  private workers: Map<string, ProcessWorker> = new Map();
  private workerSeq = 0;
  private spawn: WorkerSpawner;
  private spawnFailure: string | null = null;

  constructor(options: ProcessPoolOptions = {}) {
    super(options);
    this.spawn = options.spawn || (() => forkWorkerProcess());
  }

  protected get mode(): PoolStats['mode'] {
    return 'process';
  }

  liveWorkers(): PoolWorker[] {
    return Array.from(this.workers.values()).filter((worker) => worker.isAlive());
  }

  protected busyCount(): number {
    let busy = 0;
    for (const worker of this.workers.values()) {
      if (worker.current) busy++;
    }
    return busy;
  }

  protected isIdle(): boolean {
    return this.workers.size === 0;
  }

  shutdown(): void {
    super.shutdown();
    for (const worker of this.workers.values()) {
      if (!worker.current) {
        worker.send({ type: 'shutdown' });
      }
    }
  }

  protected dispatch(): void {
    while (this.accepting && this.pending.length > 0) {
      const worker = this.idleWorker() ?? this.startWorker();
      if (!worker) {
        // Nothing alive to wait for: fail the job instead of leaving it queued
        if (this.workers.size === 0 && this.spawnFailure) {
          this.takeNext()?.settle({
            status: 'failed',
            error: `Could not start a worker process: ${this.spawnFailure}`,
            log: '',
          });
          continue;
        }
        break;
      }

      const queued = this.takeNext();
      if (!queued) break;
      this.assign(worker, queued);
    }
  }

  private idleWorker(): ProcessWorker | undefined {
    for (const worker of this.workers.values()) {
      if (worker.isAlive() && !worker.current) return worker;
    }
    return undefined;
  }

  private startWorker(): ProcessWorker | undefined {
    if (this.workers.size >= this.maxWorkers) return undefined;

    let proc: WorkerProcess;
    try {
      proc = this.spawn();
    } catch (error) {
      this.spawnFailure = errorMessage(error);
      logger.error(`Failed to start worker process: ${this.spawnFailure}`);
      return undefined;
    }
    this.spawnFailure = null;

    const worker = new ProcessWorker(`worker-${++this.workerSeq}`, proc);
    this.workers.set(worker.id, worker);
    proc.onMessage((message) => this.handleMessage(worker, message));
    proc.onExit((code, signal) => this.handleExit(worker, code, signal));
    proc.onError((error) => logger.error(`${worker.id} error: ${error.message}`));
    logger.info(`Started ${worker.id} (pid ${proc.pid ?? 'unknown'})`);
    return worker;
  }

  private assign(worker: ProcessWorker, queued: QueuedTask): void {
    const { task } = queued;
    worker.current = {
      queued,
      detachCancel: task.token.onCancel(() => {
        worker.send({ type: 'cancel', jobId: task.jobId });
      }),
    };

    const sent = worker.send({
      type: 'run',
      jobId: task.jobId,
      items: task.items,
      categories: task.categories,
    });

    if (!sent) {
      this.completeCurrent(worker, {
        status: 'failed',
        error: `Could not hand job to ${worker.id}`,
        log: '',
      });
      worker.kill();
    }
  }

  private handleMessage(worker: ProcessWorker, raw: unknown): void {
    const parsed = ChildMessageSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed message from ${worker.id}`);
      return;
    }

    const message: ChildMessage = parsed.data;
    switch (message.type) {
      case 'ready':
        logger.debug(`${worker.id} ready (pid ${message.pid})`);
        break;
      case 'progress':
        if (worker.current?.queued.task.jobId === message.jobId) {
          worker.current.queued.task.onProgress(message.processed);
        }
        break;
      case 'done':
        if (worker.current?.queued.task.jobId !== message.jobId) {
          logger.warn(`${worker.id} reported job ${message.jobId} it was not running`);
          return;
        }
        this.completeCurrent(worker, message.outcome);
        if (this.accepting) {
          this.dispatch();
        } else {
          worker.send({ type: 'shutdown' });
        }
        break;
    }
  }

  private handleExit(worker: ProcessWorker, code: number | null, signal: NodeJS.Signals | null): void {
    worker.markExited();
    this.workers.delete(worker.id);
    logger.info(`${worker.id} exited (code=${code}, signal=${signal})`);

    if (worker.current) {
      const { task } = worker.current.queued;
      this.completeCurrent(
        worker,
        task.token.isCancelled()
          ? { status: 'aborted', log: `Worker exited after cancellation (code=${code}, signal=${signal})\n` }
          : {
              status: 'failed',
              error: `Worker process exited unexpectedly (code=${code}, signal=${signal})`,
              log: '',
            }
      );
    }

    if (this.accepting) {
      this.dispatch();
    }
    this.notifyIfIdle();
  }

  private completeCurrent(worker: ProcessWorker, outcome: JobOutcome): void {
    const assignment = worker.current;
    if (!assignment) return;
    worker.current = null;
    assignment.detachCancel();
    assignment.queued.settle(outcome);
  }
}
