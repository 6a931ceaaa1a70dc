import { CancellationToken } from '../../core/cancellation/CancellationToken.js';

/**
 * Cancellation tokens of jobs that may still be running, keyed by job id
 */
export class CancellationDirectory {
  private tokens: Map<string, CancellationToken> = new Map();

  create(jobId: string): CancellationToken {
    const token = new CancellationToken();
    this.tokens.set(jobId, token);
    return token;
  }

  get(jobId: string): CancellationToken | undefined {
    return this.tokens.get(jobId);
  }

  /**
   * Request cancellation; false when no token is held for the job
   */
  signal(jobId: string): boolean {
    const token = this.tokens.get(jobId);
    if (!token) return false;
    token.requestCancel();
    return true;
  }

  release(jobId: string): boolean {
    return this.tokens.delete(jobId);
  }

  has(jobId: string): boolean {
    return this.tokens.has(jobId);
  }

  size(): number {
    return this.tokens.size;
  }
}
