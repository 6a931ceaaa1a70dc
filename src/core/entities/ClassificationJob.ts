/**
 * Classification job domain entities
 */

export const JOB_STATUSES = ['queued', 'processing', 'completed', 'failed', 'aborted'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalJobStatus = Extract<JobStatus, 'completed' | 'failed' | 'aborted'>;

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return status === 'completed' || status === 'failed' || status === 'aborted';
}

export function isActiveStatus(status: JobStatus): boolean {
  return status === 'queued' || status === 'processing';
}

/**
 * One label/score pair as ranked by the backend (highest score first)
 */
export interface LabelScore {
  label: string;
  score: number;
}

/**
 * Outcome for a single input item
 */
export interface ClassificationResult {
  item: string;
  predictedLabel: string;
  scores: Record<string, number>;
}

export interface JobRecord {
  id: string;
  status: JobStatus;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  total: number;
  progress: number; // 0-1
  categories: string[];
  results?: ClassificationResult[];
  error?: string;
  log?: string;
}

/**
 * What a caller submits; `total` is derived from `items`
 */
export interface NewJob {
  items: string[];
  categories: string[];
}

/**
 * Record plus derived duration in seconds
 */
export interface JobSnapshot extends JobRecord {
  duration?: number;
}

/**
 * Value returned by a job body and applied to the registry exactly once
 */
export type JobOutcome =
  | { status: 'completed'; results: ClassificationResult[]; log: string }
  | { status: 'failed'; error: string; log: string }
  | { status: 'aborted'; log: string };

export interface SubmitReceipt {
  id: string;
  status: 'processing';
  total: number;
}

export interface CancelReceipt {
  id: string;
  status: 'aborted';
  message: string;
}

export interface JobResultsView {
  id: string;
  results: ClassificationResult[];
  total: number;
  categories: string[];
}

export interface JobLogView {
  id: string;
  log: string;
}

export interface ServiceHealth {
  status: 'healthy' | 'shutting_down';
  activeJobCount: number;
  totalJobCount: number;
}

export interface JobUpdateEvent {
  jobId: string;
  status: JobStatus;
  timestamp: Date;
}
