import { InlineExecutionPool } from "../src/infrastructure/pool/InlineExecutionPool.js";
import { CancellationToken } from "../src/core/cancellation/CancellationToken.js";
import { PoolTask } from "../src/core/interfaces/IExecutionPool.js";
import { PoolExhaustedError } from "../src/core/errors.js";
import { GatedBackend, StubBackend, waitFor } from "./helpers.js";

function task(jobId: string, items: string[] = ["a"], onProgress: (processed: number) => void = () => {}): PoolTask {
  return { jobId, items, categories: ["x", "y"], token: new CancellationToken(), onProgress };
}

describe("InlineExecutionPool", () => {
  test("should run a task and resolve its outcome", async () => {
    const pool = new InlineExecutionPool(new StubBackend());
    const progress: number[] = [];

    const outcome = await pool.submit(task("job-1", ["a", "b"], (processed) => progress.push(processed)));

    expect(outcome.status).toBe("completed");
    expect(progress).toEqual([1, 2]);
    expect(pool.stats()).toEqual({ mode: "inline", maxWorkers: 1, busy: 0, pending: 0, accepting: true });
  });

  test("should run at most maxWorkers tasks at once", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend, { maxWorkers: 2 });

    const outcomes = [pool.submit(task("job-1")), pool.submit(task("job-2")), pool.submit(task("job-3"))];
    await waitFor(() => backend.pending.length === 2);

    expect(pool.stats().busy).toBe(2);
    expect(pool.stats().pending).toBe(1);
    expect(pool.liveWorkers()).toHaveLength(2);

    backend.releaseNext();
    await waitFor(() => backend.callCount === 3);
    backend.releaseNext();
    backend.releaseNext();

    const settled = await Promise.all(outcomes);
    expect(settled.map((outcome) => outcome.status)).toEqual(["completed", "completed", "completed"]);
  });

  test("should reject when the pending queue is full", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend, { maxWorkers: 1, maxPending: 1 });

    const running = pool.submit(task("job-1"));
    await waitFor(() => backend.pending.length === 1);
    const queued = pool.submit(task("job-2"));

    expect(pool.canAccept()).toBe(false);
    await expect(pool.submit(task("job-3"))).rejects.toBeInstanceOf(PoolExhaustedError);

    backend.releaseNext();
    await waitFor(() => backend.pending.length === 1);
    backend.releaseNext();
    await Promise.all([running, queued]);
  });

  test("should admit a task for a free worker even with no pending room", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend, { maxWorkers: 1, maxPending: 0 });

    expect(pool.canAccept()).toBe(true);
    const running = pool.submit(task("job-1"));
    await waitFor(() => backend.pending.length === 1);

    expect(pool.canAccept()).toBe(false);
    await expect(pool.submit(task("job-2"))).rejects.toBeInstanceOf(PoolExhaustedError);

    backend.releaseNext();
    await expect(running).resolves.toMatchObject({ status: "completed" });
  });

  test("should settle a queued task as aborted when its token is cancelled", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend);

    const running = pool.submit(task("job-1"));
    const waiting = task("job-2");
    const queued = pool.submit(waiting);
    waiting.token.requestCancel();

    await expect(queued).resolves.toEqual({ status: "aborted", log: "Cancelled before start\n" });
    expect(pool.stats().pending).toBe(0);

    await waitFor(() => backend.pending.length === 1);
    backend.releaseNext();
    await running;
    expect(backend.callCount).toBe(1);
  });

  test("should abort queued tasks and refuse new ones on shutdown", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend);

    const running = pool.submit(task("job-1"));
    const queued = pool.submit(task("job-2"));
    pool.shutdown();

    await expect(queued).resolves.toEqual({
      status: "aborted",
      log: "Cancelled before start: execution pool shut down\n",
    });
    expect(pool.canAccept()).toBe(false);
    await expect(pool.submit(task("job-3"))).rejects.toThrow("Execution pool is shut down");

    await waitFor(() => backend.pending.length === 1);
    backend.releaseNext();
    await expect(running).resolves.toMatchObject({ status: "completed" });
    await expect(pool.waitForIdle(100)).resolves.toBe(true);
  });

  test("should report not idle while a body runs and idle once it ends", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend);

    const running = pool.submit(task("job-1"));
    await waitFor(() => backend.pending.length === 1);

    await expect(pool.waitForIdle(20)).resolves.toBe(false);

    const idle = pool.waitForIdle(1000);
    backend.releaseNext();
    await running;
    await expect(idle).resolves.toBe(true);
  });

  test("should settle an abandoned body as aborted when its worker is terminated", async () => {
    const backend = new GatedBackend();
    const pool = new InlineExecutionPool(backend);
    const running = task("job-1", ["a", "b"]);

    const outcome = pool.submit(running);
    await waitFor(() => backend.pending.length === 1);

    const [worker] = pool.liveWorkers();
    worker.terminate();

    await expect(outcome).resolves.toEqual({
      status: "aborted",
      log: `Worker ${worker.id} terminated before the job finished\n`,
    });
    expect(running.token.isCancelled()).toBe(true);
    expect(worker.isAlive()).toBe(false);
    expect(pool.liveWorkers()).toHaveLength(0);

    // the abandoned call finishing later changes nothing
    backend.releaseNext();
    await expect(pool.waitForIdle(100)).resolves.toBe(true);
  });
});
