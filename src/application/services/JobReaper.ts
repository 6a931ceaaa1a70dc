import { IJobRegistry } from '../../core/interfaces/IJobRegistry.js';
import { isTerminalStatus } from '../../core/entities/ClassificationJob.js';
import { errorMessage } from '../../core/errors.js';
import { CancellationDirectory } from '../../infrastructure/cancellation/CancellationDirectory.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { sleep } from '../../utils/retry.js';

const logger = createLogger('Reaper');

export interface ReaperOptions {
  intervalMs?: number;
  retentionMs?: number;
}

export const DEFAULT_REAPER_INTERVAL_MS = 300_000;
export const DEFAULT_RETENTION_MS = 3_600_000;

/**
 * Periodically evicts finished jobs once their retention has passed
 */
export class JobReaper {
  readonly intervalMs: number;
  readonly retentionMs: number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(
    private registry: IJobRegistry,
    private cancellations: CancellationDirectory,
    options: ReaperOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_REAPER_INTERVAL_MS;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
  }

  /**
   * Delete terminal records completed more than `retentionMs` before `now`.
   * Returns the number evicted.
   */
  sweep(now: number = Date.now()): number {
    let evicted = 0;
    for (const record of this.registry.list()) {
      if (!isTerminalStatus(record.status) || !record.completedAt) continue;
      if (now - record.completedAt.getTime() <= this.retentionMs) continue;

      if (this.registry.delete(record.id)) {
        this.cancellations.release(record.id);
        evicted++;
      }
    }

    if (evicted > 0) {
      logger.info(`Evicted ${evicted} expired job(s), ${this.registry.size()} remaining`);
    }
    return evicted;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    logger.info(`Started (every ${this.intervalMs / 1000}s, retention ${this.retentionMs / 1000}s)`);
  }

  /**
   * Abort the pending sleep and wait for the loop to exit
   */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;

    this.controller?.abort();
    await loop;
    this.controller = null;
    this.loop = null;
    logger.info('Stopped');
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (await sleep(this.intervalMs, signal)) {
      try {
        this.sweep();
      } catch (error) {
        logger.error(`Sweep failed: ${errorMessage(error)}`);
      }
    }
  }
}
