import { LabelScore } from '../entities/ClassificationJob.js';

/**
 * Interface for the inference backend
 */
export interface IClassifierBackend {
  /**
   * Rank `labels` for one piece of text, highest score first.
   * Throws when inference fails.
   */
  classify(text: string, labels: string[]): Promise<LabelScore[]>;
}
