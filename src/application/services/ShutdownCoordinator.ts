import { IExecutionPool } from '../../core/interfaces/IExecutionPool.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { JobOrchestrator } from './JobOrchestrator.js';
import { JobReaper } from './JobReaper.js';

const logger = createLogger('Shutdown');

const SETTLE_TIMEOUT_MS = 1000;

export type ShutdownPhase = 'idle' | 'draining' | 'terminating' | 'killing' | 'stopped';

/**
 * Something to close once the workers are gone (HTTP server, MCP transport)
 */
export interface Closable {
  name: string;
  close(): Promise<void>;
}

export interface ShutdownOptions {
  orchestrator: JobOrchestrator;
  pool: IExecutionPool;
  reaper?: JobReaper;
  closables?: Closable[];
  graceMs?: number;
  killGraceMs?: number;
  /**
   * Upper bound on the whole sequence; defaults to graceMs + killGraceMs + 3000
   */
  deadlineMs?: number;
  exit?: (code: number) => void;
}

/**
 * Drains the service: stop intake, abort jobs, let the pool wind down,
 * then SIGTERM and finally SIGKILL whatever is still alive.
 */
export class ShutdownCoordinator {
  private readonly graceMs: number;
  private readonly killGraceMs: number;
  private readonly deadlineMs: number;
  private readonly closables: Closable[];
  private readonly exit: (code: number) => void;
  private currentPhase: ShutdownPhase = 'idle';
  private running: Promise<void> | null = null;

  constructor(private options: ShutdownOptions) {
    this.graceMs = options.graceMs ?? 5000;
    this.killGraceMs = options.killGraceMs ?? 2000;
    this.deadlineMs = options.deadlineMs ?? this.graceMs + this.killGraceMs + 3000;
    this.closables = [...(options.closables ?? [])];
    this.exit = options.exit ?? ((code) => process.exit(code));
  }

  get phase(): ShutdownPhase {
    return this.currentPhase;
  }

  /**
   * Run the sequence once; later calls share the first run
   */
  run(reason: string): Promise<void> {
    if (!this.running) {
      this.running = this.runWithDeadline(reason);
    }
    return this.running;
  }

  /**
   * Fire-and-forget form for signal and error handlers
   */
  trigger(reason: string): void {
    this.run(reason).catch((error: unknown) => {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
    });
  }

  private async runWithDeadline(reason: string): Promise<void> {
    logger.warn(`Shutting down: ${reason}`);

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      timer = setTimeout(() => resolve('deadline'), this.deadlineMs);
    });

    try {
      const result = await Promise.race([this.sequence().then(() => 'done' as const), deadline]);
      if (result === 'deadline') {
        logger.error(`Shutdown did not finish within ${this.deadlineMs}ms; exiting anyway`);
      }
    } catch (error) {
      logger.error(`Shutdown sequence error: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timer);
    }

    this.currentPhase = 'stopped';
    logger.info('Shutdown complete');
    this.exit(0);
  }

  private async sequence(): Promise<void> {
    const { orchestrator, pool, reaper } = this.options;

    this.currentPhase = 'draining';
    orchestrator.beginShutdown();
    logger.info('Stopped accepting jobs');

    if (reaper) {
      await this.step('stop reaper', () => reaper.stop());
    }

    await this.step('abort outstanding jobs', () => {
      const aborted = orchestrator.abortOutstanding('service shutting down');
      logger.info(`Marked ${aborted.length} job(s) as aborted`);
    });

    await this.step('shut down pool', () => pool.shutdown());

    const drained = await pool.waitForIdle(this.graceMs);
    if (drained) {
      logger.info('Execution pool drained');
    } else {
      await this.escalate(pool);
    }

    await this.step('apply final outcomes', async () => {
      if (!(await orchestrator.waitForSettled(SETTLE_TIMEOUT_MS))) {
        logger.warn(`Some job outcomes were not applied within ${SETTLE_TIMEOUT_MS}ms`);
      }
    });

    for (const closable of this.closables) {
      await this.step(`close ${closable.name}`, () => closable.close());
    }
  }

  private async escalate(pool: IExecutionPool): Promise<void> {
    this.currentPhase = 'terminating';
    const live = pool.liveWorkers();
    logger.warn(`Pool still busy after ${this.graceMs}ms; terminating ${live.length} worker(s)`);
    for (const worker of live) {
      await this.step(`terminate ${worker.id}`, () => worker.terminate());
    }

    if (await pool.waitForIdle(this.killGraceMs)) {
      logger.info('Workers exited after terminate');
      return;
    }

    this.currentPhase = 'killing';
    const survivors = pool.liveWorkers();
    logger.warn(`Killing ${survivors.length} worker(s) still alive after ${this.killGraceMs}ms`);
    for (const worker of survivors) {
      await this.step(`kill ${worker.id}`, () => worker.kill());
    }
  }

  private async step(name: string, action: () => void | Promise<void>): Promise<void> {
    try {
      await action();
    } catch (error) {
      logger.error(`Shutdown step "${name}" failed: ${errorMessage(error)}`);
    }
  }
}
