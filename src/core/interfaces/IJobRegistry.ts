import { JobRecord, NewJob } from '../entities/ClassificationJob.js';

/**
 * Store of job records keyed by id
 */
export interface IJobRegistry {
  /**
   * Allocate a fresh id and insert a queued record
   */
  create(job: NewJob): string;

  get(jobId: string): JobRecord | undefined;

  /**
   * Read-modify-write of one record. Returns the updated copy,
   * or undefined (without calling `mutate`) when the id is unknown.
   */
  update(jobId: string, mutate: (record: JobRecord) => void): JobRecord | undefined;

  delete(jobId: string): boolean;

  /**
   * Ids of queued and processing records
   */
  listActive(): string[];

  list(): JobRecord[];

  size(): number;
}
