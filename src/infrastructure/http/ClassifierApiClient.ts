import fetch from 'node-fetch';
import { z } from 'zod';
import { IClassifierBackend } from '../../core/interfaces/IClassifierBackend.js';
import { LabelScore } from '../../core/entities/ClassificationJob.js';
import { ClassifierBackendError } from '../../core/errors.js';
import type { Config } from '../../config.js';
import { withRetry, CircuitBreaker, DEFAULT_RETRY_CONFIG, RetryConfig, isRetryableError } from '../../utils/retry.js';

const ZeroShotPayloadSchema = z.object({
  sequence: z.string().optional(),
  labels: z.array(z.string()),
  scores: z.array(z.number()),
});

// Some inference servers wrap single answers in an array
const ZeroShotResponseSchema = z.union([
  ZeroShotPayloadSchema,
  z.array(ZeroShotPayloadSchema).length(1).transform(([payload]) => payload),
]);

export interface ClassifierApiClientOptions {
  apiUrl: string;
  model: string;
  apiToken?: string;
  circuitBreaker?: CircuitBreaker;
  retryConfig?: RetryConfig;
}

/**
 * Client for a hosted zero-shot classification endpoint
 * (`POST {apiUrl}/models/{model}` with `candidate_labels`)
 */
export class ClassifierApiClient implements IClassifierBackend {
  private apiUrl: string;
  private model: string;
  private apiToken?: string;
  private circuitBreaker: CircuitBreaker;
  private retryConfig: RetryConfig;

  constructor(options: ClassifierApiClientOptions) {
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');
    this.model = options.model;
    this.apiToken = options.apiToken;
    this.circuitBreaker = options.circuitBreaker || new CircuitBreaker(5, 60000);
    this.retryConfig = options.retryConfig || DEFAULT_RETRY_CONFIG;
  }

  async classify(text: string, labels: string[]): Promise<LabelScore[]> {
    const body = await this.circuitBreaker.execute(() =>
      withRetry(
        async () => {
          const res = await fetch(`${this.apiUrl}/models/${this.model}`, {
            method: 'POST',
            headers: this.headers(),
            body: JSON.stringify({
              inputs: text,
              parameters: { candidate_labels: labels, multi_label: false },
            }),
          });

          if (!res.ok) {
            throw new ClassifierBackendError(`Classifier HTTP error! status: ${res.status}`, res.status);
          }

          return (await res.json()) as unknown;
        },
        this.retryConfig,
        { shouldRetry: isRetryableError }
      )
    );

    const parsed = ZeroShotResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ClassifierBackendError(`Unexpected classifier response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }

    return rankLabels(parsed.data.labels, parsed.data.scores);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.apiUrl}/models/${this.model}`, {
        method: 'GET',
        headers: this.headers(),
      });
      return res.ok;
    } catch {
      return false;
    }
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiToken) {
      headers.Authorization = `Bearer ${this.apiToken}`;
    }
    return headers;
  }
}

/**
 * Pair labels with scores and sort highest first
 */
export function rankLabels(labels: string[], scores: number[]): LabelScore[] {
  if (labels.length !== scores.length) {
    throw new ClassifierBackendError(
      `Classifier returned ${labels.length} labels but ${scores.length} scores`
    );
  }
  return labels
    .map((label, index) => ({ label, score: scores[index] }))
    .sort((a, b) => b.score - a.score);
}

/**
 * Client wired from the `classifier` section of the configuration
 */
export function createClassifierApiClient(config: Config['classifier']): ClassifierApiClient {
  return new ClassifierApiClient({
    apiUrl: config.apiUrl,
    model: config.model,
    apiToken: config.apiToken,
    circuitBreaker: new CircuitBreaker(5, 60000),
    retryConfig: {
      maxAttempts: config.retryAttempts,
      initialDelayMs: config.retryInitialDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      multiplier: 2,
      timeoutMs: config.timeoutMs,
    },
  });
}
