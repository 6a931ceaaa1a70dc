jest.mock("node-fetch", () => {
  const actual = jest.requireActual("node-fetch");
  return { __esModule: true, ...actual, default: jest.fn() };
});

import fetch, { Response } from "node-fetch";
import { ClassifierApiClient, createClassifierApiClient, rankLabels } from "../src/infrastructure/http/ClassifierApiClient.js";
import { ClassifierBackendError } from "../src/core/errors.js";
import { CircuitBreaker, RetryConfig } from "../src/utils/retry.js";

const mockFetch = jest.mocked(fetch);

const FAST_RETRY: RetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 1,
  maxDelayMs: 1,
  multiplier: 1,
  timeoutMs: 1000,
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function client(): ClassifierApiClient {
  return new ClassifierApiClient({
    apiUrl: "http://classifier.test/",
    model: "zero-shot",
    apiToken: "test-token",
    circuitBreaker: new CircuitBreaker(5, 60000),
    retryConfig: FAST_RETRY,
  });
}

describe("ClassifierApiClient", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  test("should post a zero-shot request and rank the answer", async () => {
    mockFetch.mockImplementation(async () =>
      jsonResponse({ sequence: "great film", labels: ["negative", "positive"], scores: [0.2, 0.8] })
    );

    const ranked = await client().classify("great film", ["positive", "negative"]);

    expect(ranked).toEqual([
      { label: "positive", score: 0.8 },
      { label: "negative", score: 0.2 },
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe("http://classifier.test/models/zero-shot");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-token" });
    expect(JSON.parse(String(init?.body))).toEqual({
      inputs: "great film",
      parameters: { candidate_labels: ["positive", "negative"], multi_label: false },
    });
  });

  test("should accept an answer wrapped in a one-element array", async () => {
    mockFetch.mockImplementation(async () => jsonResponse([{ labels: ["a", "b"], scores: [0.4, 0.6] }]));

    await expect(client().classify("text", ["a", "b"])).resolves.toEqual([
      { label: "b", score: 0.6 },
      { label: "a", score: 0.4 },
    ]);
  });

  test("should retry a server error", async () => {
    mockFetch
      .mockImplementationOnce(async () => jsonResponse({ error: "loading" }, 503))
      .mockImplementationOnce(async () => jsonResponse({ labels: ["a"], scores: [1] }));

    await expect(client().classify("text", ["a"])).resolves.toEqual([{ label: "a", score: 1 }]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  test("should not retry a client error", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ error: "bad input" }, 400));

    const failure = client().classify("text", ["a"]);

    await expect(failure).rejects.toBeInstanceOf(ClassifierBackendError);
    await expect(failure).rejects.toThrow("Classifier HTTP error! status: 400");
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  test("should reject an answer of the wrong shape", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ labels: "a" }));

    await expect(client().classify("text", ["a"])).rejects.toThrow(/^Unexpected classifier response/);
  });

  test("should report health from the model endpoint", async () => {
    mockFetch.mockImplementationOnce(async () => jsonResponse({ ok: true }));
    await expect(client().healthCheck()).resolves.toBe(true);

    mockFetch.mockImplementationOnce(async () => {
      throw new Error("ECONNREFUSED");
    });
    await expect(client().healthCheck()).resolves.toBe(false);
  });

  test("should be built from configuration", async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ labels: ["a"], scores: [1] }));
    const configured = createClassifierApiClient({
      apiUrl: "http://localhost:8080",
      model: "facebook/bart-large-mnli",
      timeoutMs: 1000,
      retryAttempts: 1,
      retryInitialDelayMs: 1,
      retryMaxDelayMs: 1,
    });

    await configured.classify("text", ["a"]);

    expect(mockFetch.mock.calls[0][0]).toBe("http://localhost:8080/models/facebook/bart-large-mnli");
    expect(mockFetch.mock.calls[0][1]?.headers).toEqual({ "Content-Type": "application/json" });
    expect(configured.getCircuitBreakerState()).toBe("closed");
  });
});

describe("rankLabels", () => {
  test("should sort labels by descending score", () => {
    expect(rankLabels(["a", "b", "c"], [0.1, 0.7, 0.2]).map((entry) => entry.label)).toEqual(["b", "c", "a"]);
  });

  test("should reject mismatched lengths", () => {
    expect(() => rankLabels(["a", "b"], [1])).toThrow("Classifier returned 2 labels but 1 scores");
  });
});
