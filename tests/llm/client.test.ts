import { describe, expect, test, vi } from "vitest";

import type { FetchLike, LlmRequest } from "../../src/llm/types";

import { buildMessagesUrl, buildRequestBody, LlmClient, parseResponseBody } from "../../src/llm/client";
import { PerformanceStats } from "../../src/llm/stats";
import { LlmError } from "../../src/utils/errors";

const config = {
  apiBaseUrl: "https://api.example.test",
  apiKey: "test-secret",
  maxTokens: 1024,
  model: "test-model",
  requestTimeoutMs: 5_000,
};

const okBody = JSON.stringify({
  content: [{ text: "hi there", type: "text" }],
  id: "msg_1",
  stop_reason: "end_turn",
  usage: { input_tokens: 10, output_tokens: 3 },
});

const request: LlmRequest = {
  messages: [{ content: [{ text: "hello", type: "text" }], role: "user" }],
};

type Reply = { body: string; headers?: Record<string, string>; status: number };

function scriptedFetch(replies: Reply[]) {
  const calls: Array<{ init: RequestInit; url: string }> = [];
  const fetchImpl: FetchLike = (url, init) => {
    calls.push({ init, url });
    const reply = replies[Math.min(calls.length - 1, replies.length - 1)];
    if (!reply) {
      return Promise.reject(new Error("no scripted reply"));
    }
    return Promise.resolve(new Response(reply.body, { headers: reply.headers, status: reply.status }));
  };
  return { calls, fetchImpl };
}

function createClient(replies: Reply[], stats = new PerformanceStats()) {
  const { calls, fetchImpl } = scriptedFetch(replies);
  const sleep = vi.fn((_delayMs: number) => Promise.resolve());
  const client = new LlmClient(config, { fetch: fetchImpl, runId: "run-123", sleep, stats });
  return { calls, client, sleep, stats };
}

describe("LlmClient request shape", () => {
  test("posts to the messages endpoint with auth, version and correlation headers", async () => {
    const { calls, client } = createClient([{ body: okBody, status: 200 }]);

    await client.chat(request);

    expect(calls).toHaveLength(1);
    const call = calls[0];
    expect(call?.url).toBe("https://api.example.test/v1/messages");
    expect(call?.init.method).toBe("POST");
    expect(call?.init.headers).toEqual({
      "anthropic-version": "2023-06-01",
      "content-type": "application/json",
      "x-api-key": "test-secret",
      "x-request-id": "run-123",
    });
    expect(JSON.parse(String(call?.init.body))).toEqual({
      max_tokens: 1024,
      messages: [{ content: [{ text: "hello", type: "text" }], role: "user" }],
      model: "test-model",
    });
  });

  test("lifts leading system messages and includes the tool manifest when given", () => {
    const body = buildRequestBody(config, {
      messages: [
        { content: [{ text: "be brief", type: "text" }], role: "system" },
        { content: [{ text: "hello", type: "text" }], role: "user" },
      ],
      tools: [
        {
          description: "Run it",
          input_schema: { properties: {}, required: [], type: "object" },
          name: "run",
        },
      ],
    });

    expect(body.system).toBe("be brief");
    expect(body.messages).toEqual([{ content: [{ text: "hello", type: "text" }], role: "user" }]);
    expect(body.tools).toHaveLength(1);
  });

  test("does not double the messages path", () => {
    expect(buildMessagesUrl("https://api.example.test/")).toBe("https://api.example.test/v1/messages");
    expect(buildMessagesUrl("https://proxy.example.test/v1/messages")).toBe(
      "https://proxy.example.test/v1/messages"
    );
  });
});

describe("LlmClient resilience", () => {
  test("429, 429, 200 succeeds on the third attempt with no recorded failure", async () => {
    const { calls, client, sleep, stats } = createClient([
      { body: "slow down", headers: { "retry-after": "1" }, status: 429 },
      { body: "slow down", status: 429 },
      { body: okBody, status: 200 },
    ]);

    const response = await client.chat(request);

    expect(response.content).toEqual([{ text: "hi there", type: "text" }]);
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls.map(([delayMs]) => delayMs)).toEqual([1000, 2000]);
    const snapshot = stats.snapshot();
    expect(snapshot.successfulRequests).toBe(1);
    expect(snapshot.failedRequests).toBe(0);
    expect(snapshot.totalRequests).toBe(1);
    expect(snapshot.totalAttempts).toBe(3);
    expect(snapshot.totalRetries).toBe(2);
  });

  test("401 fails once without retrying", async () => {
    const { calls, client, sleep, stats } = createClient([{ body: "nope", status: 401 }]);

    const error: unknown = await client.chat(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LlmError);
    if (error instanceof LlmError) {
      expect(error.failure).toEqual({ kind: "authentication" });
      expect(error.disposition).toBe("permanent");
      expect(error.attempts).toBe(1);
      expect(error.message).toBe("Authentication failed: invalid API key");
    }
    expect(calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(stats.snapshot()).toMatchObject({ failedRequests: 1, successfulRequests: 0, totalRequests: 1 });
  });

  test("400 surfaces the body as an invalid request", async () => {
    const { client } = createClient([{ body: "bad field", status: 400 }]);

    await expect(client.chat(request)).rejects.toThrow("Invalid request: bad field");
  });

  test("network errors are retried", async () => {
    let attempt = 0;
    const fetchImpl: FetchLike = () => {
      attempt += 1;
      return attempt === 1
        ? Promise.reject(new TypeError("fetch failed"))
        : Promise.resolve(new Response(okBody, { status: 200 }));
    };
    const client = new LlmClient(config, { fetch: fetchImpl, sleep: () => Promise.resolve() });

    const response = await client.chat(request);

    expect(response.id).toBe("msg_1");
    expect(client.getStats().snapshot().totalRetries).toBe(1);
  });

  test("gives up with the last error once the elapsed budget would be exceeded", async () => {
    let clock = 0;
    const { fetchImpl } = scriptedFetch([{ body: "busy", status: 529 }]);
    const client = new LlmClient(config, {
      fetch: fetchImpl,
      now: () => clock,
      policy: { initialDelayMs: 1000, maxDelayMs: 30_000, maxElapsedMs: 5_000, multiplier: 2 },
      sleep: (delayMs) => {
        clock += delayMs;
        return Promise.resolve();
      },
    });

    const error: unknown = await client.chat(request).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(LlmError);
    if (error instanceof LlmError) {
      expect(error.failure).toEqual({ body: "busy", kind: "overloaded" });
      // Delays of 1s and 2s fit the 5s budget; the next 4s delay would not.
      expect(error.attempts).toBe(3);
    }
    expect(client.getStats().snapshot()).toMatchObject({
      failedRequests: 1,
      totalAttempts: 3,
      totalRetries: 2,
    });
  });

  test("an outer abort stops the call without classifying it", async () => {
    const controller = new AbortController();
    const fetchImpl: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    const client = new LlmClient(config, { fetch: fetchImpl });
    const reason = new Error("turn deadline");

    const pending = client.chat({ ...request, signal: controller.signal });
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  test("a per-attempt timeout is classified as timeout", async () => {
    vi.useFakeTimers();
    try {
      const fetchImpl: FetchLike = (_url, init) =>
        new Promise((_resolve, reject) => {
          init.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
        });
      const client = new LlmClient(
        { ...config, requestTimeoutMs: 2_000 },
        {
          fetch: fetchImpl,
          policy: { initialDelayMs: 1000, maxDelayMs: 1000, maxElapsedMs: 0, multiplier: 2 },
        }
      );

      const pending = client.chat(request).catch((caught: unknown) => caught);
      await vi.advanceTimersByTimeAsync(2_000);
      const error = await pending;

      expect(error).toBeInstanceOf(LlmError);
      if (error instanceof LlmError) {
        expect(error.failure).toEqual({ kind: "timeout", seconds: 2 });
      }
    } finally {
      vi.useRealTimers();
    }
  });
});

describe("parseResponseBody", () => {
  test("maps usage and tool_use blocks", () => {
    const response = parseResponseBody(
      JSON.stringify({
        content: [
          { text: "Reading.", type: "text" },
          { id: "tu_1", input: { file_path: "/tmp/a" }, name: "read_file", type: "tool_use" },
          { type: "thinking" },
        ],
        usage: { input_tokens: 5, output_tokens: 7 },
      })
    );

    expect(response).toEqual({
      content: [
        { text: "Reading.", type: "text" },
        { id: "tu_1", input: { file_path: "/tmp/a" }, name: "read_file", type: "tool_use" },
      ],
      usage: { inputTokens: 5, outputTokens: 7 },
    });
  });

  test("rejects malformed bodies as parse failures", () => {
    const failures = ["not json", JSON.stringify({ content: "text" }), JSON.stringify({ content: [{ type: "tool_use" }] })].map(
      (body) => {
        try {
          parseResponseBody(body);
          return undefined;
        } catch (error) {
          return error instanceof LlmError ? error.failure.kind : "other";
        }
      }
    );

    expect(failures).toEqual(["parse", "parse", "parse"]);
  });
});
