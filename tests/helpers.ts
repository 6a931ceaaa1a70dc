import { IClassifierBackend } from "../src/core/interfaces/IClassifierBackend.js";
import { LabelScore } from "../src/core/entities/ClassificationJob.js";

/**
 * First label wins with 0.9, the rest share 0.1
 */
export function rankFirst(labels: string[]): LabelScore[] {
  return labels.map((label, index) => ({
    label,
    score: index === 0 ? 0.9 : 0.1 / (labels.length - 1),
  }));
}

/**
 * Backend answering synchronously from a function of (text, labels, call number)
 */
export class StubBackend implements IClassifierBackend {
  calls: Array<{ text: string; labels: string[] }> = [];

  constructor(
    private respond: (text: string, labels: string[], call: number) => LabelScore[] = (_text, labels) =>
      rankFirst(labels)
  ) {}

  async classify(text: string, labels: string[]): Promise<LabelScore[]> {
    this.calls.push({ text, labels });
    return this.respond(text, labels, this.calls.length);
  }
}

interface PendingCall {
  text: string;
  labels: string[];
  resolve: (ranked: LabelScore[]) => void;
  reject: (error: Error) => void;
}

/**
 * Backend whose calls stay pending until the test releases them
 */
export class GatedBackend implements IClassifierBackend {
  pending: PendingCall[] = [];
  callCount = 0;

  classify(text: string, labels: string[]): Promise<LabelScore[]> {
    this.callCount++;
    return new Promise((resolve, reject) => {
      this.pending.push({ text, labels, resolve, reject });
    });
  }

  releaseNext(): void {
    const call = this.pending.shift();
    if (!call) throw new Error("No classify call is pending");
    call.resolve(rankFirst(call.labels));
  }

  failNext(error: Error): void {
    const call = this.pending.shift();
    if (!call) throw new Error("No classify call is pending");
    call.reject(error);
  }
}

export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Poll until `predicate` holds, failing after `timeoutMs`
 */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error("Condition not met in time");
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
