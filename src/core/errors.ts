import { JobStatus } from './entities/ClassificationJob.js';

export type JobServiceErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'POOL_EXHAUSTED'
  | 'SHUTTING_DOWN';

/**
 * Base class for errors surfaced to callers of the orchestrator.
 * `httpStatus` is what the web layer answers with.
 */
export class JobServiceError extends Error {
  constructor(
    message: string,
    readonly code: JobServiceErrorCode,
    readonly httpStatus: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidRequestError extends JobServiceError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
  }
}

export class JobNotFoundError extends JobServiceError {
  constructor(readonly jobId: string) {
    super('Job not found', 'NOT_FOUND', 404);
  }
}

export class InvalidJobStateError extends JobServiceError {
  constructor(message: string, readonly status: JobStatus) {
    super(message, 'INVALID_STATE', 400);
  }
}

export class PoolExhaustedError extends JobServiceError {
  constructor(pending: number) {
    super(`Execution pool is full (${pending} jobs waiting), try again later`, 'POOL_EXHAUSTED', 503);
  }
}

export class ShuttingDownError extends JobServiceError {
  constructor() {
    super('Service is shutting down', 'SHUTTING_DOWN', 503);
  }
}

/**
 * Raised by the inference backend. Recorded on the job, never returned to a request.
 */
export class ClassifierBackendError extends Error {
  constructor(message: string, readonly statusCode?: number) {
    super(message);
    this.name = 'ClassifierBackendError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
