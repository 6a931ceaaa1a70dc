import { IClassifierBackend } from '../../core/interfaces/IClassifierBackend.js';
import { CancellationToken } from '../../core/cancellation/CancellationToken.js';
import { errorMessage } from '../../core/errors.js';
import { runClassificationJob } from '../../application/jobs/runClassificationJob.js';
import { loadConfig } from '../../config.js';
import { LazyClassifierBackend } from '../http/LazyClassifierBackend.js';
import { createClassifierApiClient } from '../http/ClassifierApiClient.js';
import { configureLogging, createLogger } from '../logging/logger.js';
import { ChildMessage, ParentMessage, ParentMessageSchema } from './protocol.js';

const logger = createLogger('Worker');

/**
 * Message loop of a pool worker process. Runs the jobs the parent hands
 * over and reports progress and outcomes back over IPC.
 */
export class WorkerRuntime {
  private tokens: Map<string, CancellationToken> = new Map();
  private stopping = false;

  constructor(
    private backend: IClassifierBackend,
    private send: (message: ChildMessage) => void,
    private exit: (code: number) => void
  ) {}

  handle(raw: unknown): void {
    const parsed = ParentMessageSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Ignoring malformed message from parent');
      return;
    }

    const message: ParentMessage = parsed.data;
    switch (message.type) {
      case 'run':
        void this.run(message.jobId, message.items, message.categories);
        break;
      case 'cancel':
        this.tokens.get(message.jobId)?.requestCancel();
        break;
      case 'shutdown':
        this.stop('shutdown requested by parent');
        break;
    }
  }

  /**
   * Cancel whatever is running and leave
   */
  stop(reason: string): void {
    if (this.stopping) return;
    this.stopping = true;
    logger.info(`Worker ${process.pid} stopping: ${reason}`);
    for (const token of this.tokens.values()) {
      token.requestCancel();
    }
    this.exit(0);
  }

  activeJobs(): string[] {
    return Array.from(this.tokens.keys());
  }

  private async run(jobId: string, items: string[], categories: string[]): Promise<void> {
    const token = new CancellationToken();
    this.tokens.set(jobId, token);

    try {
      const outcome = await runClassificationJob(
        { jobId, items, categories },
        this.backend,
        token,
        (processed) => this.send({ type: 'progress', jobId, processed })
      );
      this.send({ type: 'done', jobId, outcome });
    } catch (error) {
      this.send({ type: 'done', jobId, outcome: { status: 'failed', error: errorMessage(error), log: '' } });
    } finally {
      this.tokens.delete(jobId);
    }
  }
}

function main(): void {
  const config = loadConfig(process.argv, process.env);
  configureLogging(config.service.logLevel);

  // Built on first job, then shared by every job this process runs
  const backend = new LazyClassifierBackend(() => createClassifierApiClient(config.classifier));

  const runtime = new WorkerRuntime(
    backend,
    (message) => {
      process.send?.(message);
    },
    (code) => process.exit(code)
  );

  process.on('message', (message) => runtime.handle(message));
  process.on('SIGTERM', () => runtime.stop('SIGTERM'));
  process.on('disconnect', () => runtime.stop('parent disconnected'));

  process.send?.({ type: 'ready', pid: process.pid });
}

if (require.main === module) {
  main();
}
