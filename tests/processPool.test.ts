import { EventEmitter } from "events";
import { ProcessExecutionPool, WorkerProcess } from "../src/infrastructure/pool/ProcessExecutionPool.js";
import { ParentMessage } from "../src/infrastructure/pool/protocol.js";
import { CancellationToken } from "../src/core/cancellation/CancellationToken.js";
import { PoolTask } from "../src/core/interfaces/IExecutionPool.js";
import { flush } from "./helpers.js";

class FakeWorkerProcess implements WorkerProcess {
  readonly pid: number;
  sent: ParentMessage[] = [];
  signals: NodeJS.Signals[] = [];
  connected = true;
  private events = new EventEmitter();

  constructor(pid: number, private exitOn: NodeJS.Signals[] = ["SIGKILL"]) {
    this.pid = pid;
  }

  send(message: ParentMessage): boolean {
    if (!this.connected) return false;
    this.sent.push(message);
    if (message.type === "shutdown") {
      this.exit(0, null);
    }
    return true;
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    if (this.exitOn.includes(signal)) {
      this.exit(null, signal);
    }
    return true;
  }

  onMessage(listener: (message: unknown) => void): void {
    this.events.on("message", listener);
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.events.on("exit", listener);
  }

  onError(listener: (error: Error) => void): void {
    this.events.on("error", listener);
  }

  reply(message: unknown): void {
    this.events.emit("message", message);
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    if (!this.connected) return;
    this.connected = false;
    this.events.emit("exit", code, signal);
  }

  lastRun(): Extract<ParentMessage, { type: "run" }> {
    const runs = this.sent.filter((message): message is Extract<ParentMessage, { type: "run" }> => message.type === "run");
    const last = runs[runs.length - 1];
    if (!last) throw new Error("No run message sent");
    return last;
  }
}

function task(jobId: string, onProgress: (processed: number) => void = () => {}): PoolTask {
  return { jobId, items: ["a", "b"], categories: ["x"], token: new CancellationToken(), onProgress };
}

describe("ProcessExecutionPool", () => {
  let spawned: FakeWorkerProcess[];
  let exitOn: NodeJS.Signals[];
  let pool: ProcessExecutionPool;

  beforeEach(() => {
    spawned = [];
    exitOn = ["SIGKILL"];
    pool = new ProcessExecutionPool({
      maxWorkers: 2,
      spawn: () => {
        const proc = new FakeWorkerProcess(1000 + spawned.length, exitOn);
        spawned.push(proc);
        return proc;
      },
    });
  });

  test("should hand a job to a fresh worker and resolve with its outcome", async () => {
    const progress: number[] = [];
    const outcome = pool.submit(task("job-1", (processed) => progress.push(processed)));

    expect(spawned).toHaveLength(1);
    expect(spawned[0].lastRun()).toEqual({ type: "run", jobId: "job-1", items: ["a", "b"], categories: ["x"] });

    spawned[0].reply({ type: "ready", pid: 1000 });
    spawned[0].reply({ type: "progress", jobId: "job-1", processed: 1 });
    spawned[0].reply({ type: "done", jobId: "job-1", outcome: { status: "completed", results: [], log: "done\n" } });

    await expect(outcome).resolves.toEqual({ status: "completed", results: [], log: "done\n" });
    expect(progress).toEqual([1]);
    expect(pool.stats().busy).toBe(0);
  });

  test("should reuse an idle worker for the next job", async () => {
    const first = pool.submit(task("job-1"));
    spawned[0].reply({ type: "done", jobId: "job-1", outcome: { status: "aborted", log: "" } });
    await first;

    const second = pool.submit(task("job-2"));

    expect(spawned).toHaveLength(1);
    expect(spawned[0].lastRun().jobId).toBe("job-2");
    spawned[0].reply({ type: "done", jobId: "job-2", outcome: { status: "aborted", log: "" } });
    await second;
  });

  test("should not start more than maxWorkers processes", () => {
    void pool.submit(task("job-1"));
    void pool.submit(task("job-2"));
    void pool.submit(task("job-3"));

    expect(spawned).toHaveLength(2);
    expect(pool.stats()).toMatchObject({ mode: "process", busy: 2, pending: 1 });
  });

  test("should ignore malformed and foreign messages", async () => {
    const outcome = pool.submit(task("job-1"));

    spawned[0].reply({ type: "done", jobId: "someone-else", outcome: { status: "aborted", log: "" } });
    spawned[0].reply({ nonsense: true });
    spawned[0].reply("text");
    expect(pool.stats().busy).toBe(1);

    spawned[0].reply({ type: "done", jobId: "job-1", outcome: { status: "failed", error: "bad item", log: "" } });
    await expect(outcome).resolves.toEqual({ status: "failed", error: "bad item", log: "" });
  });

  test("should forward cancellation of a running job to its worker", async () => {
    const running = task("job-1");
    const outcome = pool.submit(running);

    running.token.requestCancel();

    expect(spawned[0].sent).toContainEqual({ type: "cancel", jobId: "job-1" });
    spawned[0].reply({ type: "done", jobId: "job-1", outcome: { status: "aborted", log: "stopped\n" } });
    await expect(outcome).resolves.toEqual({ status: "aborted", log: "stopped\n" });
  });

  test("should fail the job when its worker crashes and start a replacement", async () => {
    const first = pool.submit(task("job-1"));
    const second = pool.submit(task("job-2"));
    const third = pool.submit(task("job-3"));

    spawned[0].exit(1, null);

    await expect(first).resolves.toEqual({
      status: "failed",
      error: "Worker process exited unexpectedly (code=1, signal=null)",
      log: "",
    });
    expect(spawned).toHaveLength(3);
    expect(spawned[2].lastRun().jobId).toBe("job-3");

    spawned[1].reply({ type: "done", jobId: "job-2", outcome: { status: "aborted", log: "" } });
    spawned[2].reply({ type: "done", jobId: "job-3", outcome: { status: "aborted", log: "" } });
    await Promise.all([second, third]);
  });

  test("should settle as aborted when a cancelled job's worker exits", async () => {
    const running = task("job-1");
    const outcome = pool.submit(running);
    running.token.requestCancel();

    spawned[0].exit(null, "SIGTERM");

    await expect(outcome).resolves.toEqual({
      status: "aborted",
      log: "Worker exited after cancellation (code=null, signal=SIGTERM)\n",
    });
  });

  test("should fail queued jobs when no worker can be started", async () => {
    const failing = new ProcessExecutionPool({
      spawn: () => {
        throw new Error("spawn ENOENT");
      },
    });

    await expect(failing.submit(task("job-1"))).resolves.toEqual({
      status: "failed",
      error: "Could not start a worker process: spawn ENOENT",
      log: "",
    });
  });

  test("should fail the job and kill the worker when the run message cannot be sent", async () => {
    const broken = new FakeWorkerProcess(42);
    broken.connected = false;
    const single = new ProcessExecutionPool({ spawn: () => broken });

    await expect(single.submit(task("job-1"))).resolves.toEqual({
      status: "failed",
      error: "Could not hand job to worker-1",
      log: "",
    });
    expect(broken.signals).toEqual(["SIGKILL"]);
  });

  describe("shutdown", () => {
    test("should ask idle workers to exit and become idle", async () => {
      const first = pool.submit(task("job-1"));
      spawned[0].reply({ type: "done", jobId: "job-1", outcome: { status: "aborted", log: "" } });
      await first;

      pool.shutdown();

      expect(spawned[0].sent).toContainEqual({ type: "shutdown" });
      await expect(pool.waitForIdle(100)).resolves.toBe(true);
      expect(pool.liveWorkers()).toHaveLength(0);
    });

    test("should let a busy worker finish and then send it shutdown", async () => {
      const running = pool.submit(task("job-1"));
      const queued = pool.submit(task("job-2"));
      const waiting = pool.submit(task("job-3"));

      pool.shutdown();
      await expect(waiting).resolves.toMatchObject({ status: "aborted" });
      expect(spawned[0].sent).not.toContainEqual({ type: "shutdown" });

      const idle = pool.waitForIdle(1000);
      spawned[0].reply({ type: "done", jobId: "job-1", outcome: { status: "aborted", log: "" } });
      spawned[1].reply({ type: "done", jobId: "job-2", outcome: { status: "aborted", log: "" } });
      await Promise.all([running, queued]);

      expect(spawned[0].sent).toContainEqual({ type: "shutdown" });
      await expect(idle).resolves.toBe(true);
    });

    test("should expose live workers for escalation", async () => {
      exitOn = ["SIGTERM", "SIGKILL"];
      const outcome = pool.submit(task("job-1"));
      pool.shutdown();

      const [worker] = pool.liveWorkers();
      expect(worker.pid).toBe(1000);
      worker.terminate();
      await flush();

      expect(spawned[0].signals).toEqual(["SIGTERM"]);
      await expect(outcome).resolves.toMatchObject({ status: "failed" });
      await expect(pool.waitForIdle(100)).resolves.toBe(true);
    });
  });
});
