import { randomUUID } from 'crypto';
import { IJobRegistry } from '../../core/interfaces/IJobRegistry.js';
import { JobRecord, NewJob, isActiveStatus } from '../../core/entities/ClassificationJob.js';

/**
 * Volatile job store.
 *
 * Every method is synchronous, so a read-modify-write started by one caller
 * (request handler, pool completion, reaper, shutdown) always finishes before
 * another one begins on the event loop. Records leave the registry as deep
 * copies; the only way to change stored state is `update`.
 */
export class InMemoryJobRegistry implements IJobRegistry {
  private jobs: Map<string, JobRecord> = new Map();

  constructor(private generateId: () => string = randomUUID) {}

  create(job: NewJob): string {
    let id = this.generateId();
    while (this.jobs.has(id)) {
      id = this.generateId();
    }

    this.jobs.set(id, {
      id,
      status: 'queued',
      createdAt: new Date(),
      total: job.items.length,
      progress: 0,
      categories: [...job.categories],
    });

    return id;
  }

  get(jobId: string): JobRecord | undefined {
    const record = this.jobs.get(jobId);
    return record ? structuredClone(record) : undefined;
  }

  update(jobId: string, mutate: (record: JobRecord) => void): JobRecord | undefined {
    const current = this.jobs.get(jobId);
    if (!current) return undefined;

    // Mutate a draft so a throwing mutation leaves the stored record untouched
    const draft = structuredClone(current);
    mutate(draft);
    draft.id = current.id;
    this.jobs.set(jobId, draft);
    return structuredClone(draft);
  }

  delete(jobId: string): boolean {
    return this.jobs.delete(jobId);
  }

  listActive(): string[] {
    const ids: string[] = [];
    for (const [id, record] of this.jobs) {
      if (isActiveStatus(record.status)) {
        ids.push(id);
      }
    }
    return ids;
  }

  list(): JobRecord[] {
    return Array.from(this.jobs.values(), (record) => structuredClone(record));
  }

  size(): number {
    return this.jobs.size;
  }
}
