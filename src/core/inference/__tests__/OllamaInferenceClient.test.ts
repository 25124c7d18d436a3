/**
 * OllamaInferenceClient Tests
 *
 * The endpoint is replaced by a fetch stand-in; no network is touched.
 */

import { describe, it, expect, vi } from "vitest";
import type { ClassificationRequest } from "../../../types/index.js";
import type { BatchState } from "../interfaces/IInferenceClient.js";
import { OllamaInferenceClient, type OllamaInferenceClientConfig } from "../impl/OllamaInferenceClient.js";
import { parseCompletion } from "../../classification/response-reconciler.js";

const request: ClassificationRequest = {
  batchId: "batch-001-test",
  prompt: "classify these",
  model: "test-model",
  apiUrl: "http://localhost:11434/api/generate",
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createClient(fetchMock: typeof fetch, overrides: Partial<OllamaInferenceClientConfig> = {}) {
  const states: Array<[BatchState, number]> = [];
  const client = new OllamaInferenceClient({
    maxAttempts: 3,
    requestTimeoutMs: 5_000,
    retryInitialDelayMs: 0,
    retryMaxDelayMs: 0,
    fetch: fetchMock,
    onStateChange: (_batchId, state, attempt) => states.push([state, attempt]),
    ...overrides,
  });
  return { client, states };
}

describe("OllamaInferenceClient", () => {
  it("returns the completion text on success", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ response: '{"a.pdf":"Documents"}' }));
    const { client, states } = createClient(fetchMock);

    const outcome = await client.complete(request);

    expect(outcome).toMatchObject({
      status: "succeeded",
      batchId: "batch-001-test",
      text: '{"a.pdf":"Documents"}',
      attempts: 1,
    });
    expect(states).toEqual([
      ["pending", 0],
      ["sent", 1],
      ["succeeded", 1],
    ]);
  });

  it("posts a non-streaming JSON generate request", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(jsonResponse({ response: "{}" }));
    const { client } = createClient(fetchMock);

    await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("http://localhost:11434/api/generate");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "test-model",
      prompt: "classify these",
      stream: false,
      format: "json",
    });
  });

  it("retries after a server error", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("boom", { status: 500 }))
      .mockResolvedValueOnce(jsonResponse({ response: '{"a.pdf":"Documents"}' }));
    const { client, states } = createClient(fetchMock);

    const outcome = await client.complete(request);

    expect(outcome.status).toBe("succeeded");
    expect(outcome.attempts).toBe(2);
    expect(states).toEqual([
      ["pending", 0],
      ["sent", 1],
      ["sent", 2],
      ["succeeded", 2],
    ]);
  });

  it("fails the batch after exhausting attempts", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response("boom", { status: 500 }));
    const { client, states } = createClient(fetchMock);

    const outcome = await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Endpoint returned 500: boom",
      attempts: 3,
    });
    expect(states.at(-1)).toEqual(["failed", 3]);
  });

  it("honours maxAttempts", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => new Response("nope", { status: 503 }));
    const { client } = createClient(fetchMock, { maxAttempts: 1 });

    const outcome = await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(outcome.attempts).toBe(1);
  });

  it("treats an empty completion as a retryable failure", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse({ response: "   " }));
    const { client } = createClient(fetchMock);

    const outcome = await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Model returned an empty or degenerate completion",
    });
  });

  it("asks again when the completion does not parse", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(jsonResponse({ response: '{"a.pdf": Documents, "main.rs": Code}' }))
      .mockResolvedValueOnce(jsonResponse({ response: '{"a.pdf": "Documents", "main.rs": "Code"}' }));
    const { client } = createClient(fetchMock, {
      acceptCompletion: (text) => parseCompletion(text).outcome !== "failed",
    });

    const outcome = await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({
      status: "succeeded",
      text: '{"a.pdf": "Documents", "main.rs": "Code"}',
      attempts: 2,
    });
  });

  it("fails the batch when no completion parses", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse({ response: "{ nope" }));
    const { client } = createClient(fetchMock, { acceptCompletion: () => false });

    const outcome = await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Model returned a completion that does not parse",
      attempts: 3,
    });
  });

  it("retries requests that time out", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")), {
            once: true,
          });
        })
    );
    const { client, states } = createClient(fetchMock, { maxAttempts: 2, requestTimeoutMs: 20 });

    const outcome = await client.complete(request);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({ status: "failed", attempts: 2 });
    expect(outcome.status === "failed" ? outcome.reason : "").toContain("timed out");
    expect(states.map(([state]) => state)).toEqual(["pending", "sent", "sent", "failed"]);
  });

  it("rejects a body without a response field", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse({ done: true }));
    const { client } = createClient(fetchMock, { maxAttempts: 1 });

    const outcome = await client.complete(request);

    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Response body has no string 'response' field",
    });
  });

  it("reports connection failures without throwing", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new TypeError("fetch failed"));
    const { client } = createClient(fetchMock, { maxAttempts: 2 });

    const outcome = await client.complete(request);

    expect(outcome).toMatchObject({
      status: "failed",
      reason: "Connection failed: fetch failed",
      attempts: 2,
    });
  });

  it("does not send anything once the signal is aborted", async () => {
    const fetchMock = vi.fn<typeof fetch>();
    const { client, states } = createClient(fetchMock);
    const controller = new AbortController();
    controller.abort();

    const outcome = await client.complete(request, controller.signal);

    expect(fetchMock).not.toHaveBeenCalled();
    expect(outcome).toMatchObject({ status: "failed", reason: "Run cancelled before request", attempts: 1 });
    expect(states).toEqual([
      ["pending", 0],
      ["failed", 1],
    ]);
  });

  it("stops retrying when cancelled mid-request", async () => {
    const controller = new AbortController();
    const fetchMock = vi.fn<typeof fetch>().mockImplementation(async () => {
      controller.abort();
      throw new Error("This operation was aborted");
    });
    const { client } = createClient(fetchMock);

    const outcome = await client.complete(request, controller.signal);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({ status: "failed", reason: "Request cancelled", attempts: 1 });
  });
});
