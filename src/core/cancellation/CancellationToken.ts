/**
 * Cooperative cancellation flag shared between the orchestrator (which
 * requests) and a running job body (which polls between items).
 */
export class CancellationToken {
  private readonly controller = new AbortController();

  requestCancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Run `listener` once on cancellation, immediately if already cancelled.
   * Returns a function that detaches the listener.
   */
  onCancel(listener: () => void): () => void {
    const signal = this.controller.signal;
    if (signal.aborted) {
      listener();
      return () => {};
    }
    signal.addEventListener('abort', listener, { once: true });
    return () => signal.removeEventListener('abort', listener);
  }
}
