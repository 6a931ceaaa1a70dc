import { IClassifierBackend } from '../../core/interfaces/IClassifierBackend.js';
import { CancellationToken } from '../../core/cancellation/CancellationToken.js';
import { ClassificationResult, JobOutcome, LabelScore } from '../../core/entities/ClassificationJob.js';
import { errorMessage } from '../../core/errors.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { JobLog } from './JobLog.js';

const logger = createLogger('JobBody');

export interface ClassificationJobInput {
  jobId: string;
  items: string[];
  categories: string[];
}

/**
 * Classify every item in order against the job's categories.
 *
 * The token is checked before each item; an inference call already in flight
 * is allowed to finish. The body never writes job state itself: it reports
 * progress through `onProgress` and returns an outcome for the orchestrator
 * to apply.
 */
export async function runClassificationJob(
  input: ClassificationJobInput,
  backend: IClassifierBackend,
  token: CancellationToken,
  onProgress?: (processed: number) => void
): Promise<JobOutcome> {
  const { jobId, items, categories } = input;
  const log = new JobLog(jobId, logger);
  const results: ClassificationResult[] = [];

  log.info(`Starting classification job ${jobId} with ${items.length} items`);

  for (let index = 0; index < items.length; index++) {
    if (token.isCancelled()) {
      log.warn(`Job ${jobId} aborted after ${index} of ${items.length} items`);
      return { status: 'aborted', log: log.text() };
    }

    const item = items[index];
    try {
      const ranked = await backend.classify(item, categories);
      const result = toClassificationResult(item, ranked);
      results.push(result);
      log.info(`Item ${index + 1}/${items.length} classified as "${result.predictedLabel}"`);
    } catch (error) {
      const message = errorMessage(error) || 'Unknown backend error';
      log.error(`Job ${jobId} failed on item ${index + 1}/${items.length}: ${message}`);
      return { status: 'failed', error: message, log: log.text() };
    }

    onProgress?.(index + 1);
  }

  log.info(`Job ${jobId} completed successfully`);
  return { status: 'completed', results, log: log.text() };
}

export function toClassificationResult(item: string, ranked: LabelScore[]): ClassificationResult {
  if (ranked.length === 0) {
    throw new Error('Classifier returned no labels');
  }

  const scores: Record<string, number> = Object.fromEntries(ranked.map(({ label, score }) => [label, score]));

  return { item, predictedLabel: ranked[0].label, scores };
}
