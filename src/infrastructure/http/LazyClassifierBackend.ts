import { IClassifierBackend } from '../../core/interfaces/IClassifierBackend.js';
import { LabelScore } from '../../core/entities/ClassificationJob.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('Backend');

/**
 * Builds the real backend on first use and reuses it for the life of the
 * process. Concurrent first calls share one initialisation; a failed
 * initialisation is dropped so the next call tries again.
 */
export class LazyClassifierBackend implements IClassifierBackend {
  private instance: Promise<IClassifierBackend> | null = null;

  constructor(private factory: () => IClassifierBackend | Promise<IClassifierBackend>) {}

  async classify(text: string, labels: string[]): Promise<LabelScore[]> {
    const backend = await this.get();
    return backend.classify(text, labels);
  }

  isInitialized(): boolean {
    return this.instance !== null;
  }

  private get(): Promise<IClassifierBackend> {
    if (!this.instance) {
      logger.info('Initializing classifier backend');
      const pending = Promise.resolve().then(() => this.factory());
      this.instance = pending;
      pending.catch((error: unknown) => {
        logger.error(`Classifier backend initialization failed: ${errorMessage(error)}`);
        if (this.instance === pending) {
          this.instance = null;
        }
      });
    }
    return this.instance;
  }
}
