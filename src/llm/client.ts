import { randomUUID } from "node:crypto";

import type { AgentConfig } from "../types/config";
import type { LlmFailure } from "./compat";
import type { RetryPolicy, SleepFn } from "./retry";
import type { FetchLike, LlmRequest, LlmResponse } from "./types";

import { getErrorMessage, LlmError } from "../utils/errors";
import { log, logWarn } from "../utils/logger";
import {
  classifyHttpStatus,
  llmResponseSchema,
  normalizeMessagesForTransport,
  normalizeResponseContent,
} from "./compat";
import { DEFAULT_RETRY_POLICY, retryWithBackoff } from "./retry";
import { PerformanceStats } from "./stats";

export const ANTHROPIC_VERSION = "2023-06-01";
const MESSAGES_PATH = "/v1/messages";

export type LlmClientConfig = Pick<AgentConfig, "apiBaseUrl" | "apiKey" | "maxTokens" | "model" | "requestTimeoutMs">;

export type LlmClientOptions = {
  fetch?: FetchLike;
  now?: () => number;
  policy?: RetryPolicy;
  runId?: string;
  sleep?: SleepFn;
  stats?: PerformanceStats;
};

export function buildMessagesUrl(apiBaseUrl: string): string {
  const trimmed = apiBaseUrl.trim().replace(/\/+$/u, "");
  return trimmed.endsWith(MESSAGES_PATH) ? trimmed : `${trimmed}${MESSAGES_PATH}`;
}

export function buildRequestBody(
  config: Pick<AgentConfig, "maxTokens" | "model">,
  request: LlmRequest
): Record<string, unknown> {
  const transport = normalizeMessagesForTransport(request.messages);
  if (transport.reasons.length > 0) {
    log(`Normalized outgoing messages: ${transport.reasons.join(", ")}`);
  }

  return {
    max_tokens: config.maxTokens,
    messages: transport.messages,
    model: config.model,
    ...(transport.system ? { system: transport.system } : {}),
    ...(request.tools && request.tools.length > 0 ? { tools: request.tools } : {}),
  };
}

function isRetryableLlmError(error: unknown): boolean {
  return error instanceof LlmError && error.retryable;
}

/**
 * Model endpoint client. Every `chat` call is one logical request: transient
 * failures are retried with exponential backoff, and the outcome lands in the
 * shared `PerformanceStats` handle exactly once.
 */
export class LlmClient {
  readonly runId: string;
  readonly stats: PerformanceStats;
  private readonly config: LlmClientConfig;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly policy: RetryPolicy;
  private readonly sleep?: SleepFn;
  private readonly url: string;

  constructor(config: LlmClientConfig, options: LlmClientOptions = {}) {
    this.config = config;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.runId = options.runId ?? randomUUID();
    this.sleep = options.sleep;
    this.stats = options.stats ?? new PerformanceStats();
    this.url = buildMessagesUrl(config.apiBaseUrl);
  }

  getStats(): PerformanceStats {
    return this.stats;
  }

  async chat(request: LlmRequest): Promise<LlmResponse> {
    const body = JSON.stringify(buildRequestBody(this.config, request));
    const startedAt = this.now();
    let lastAttempt = 0;

    try {
      const response = await retryWithBackoff(
        (attempt) => {
          lastAttempt = attempt;
          return this.sendOnce(body, attempt, request.signal);
        },
        {
          isRetryable: isRetryableLlmError,
          now: this.now,
          onGiveUp: ({ attempt, reason }) => {
            if (reason === "budget_exhausted") {
              logWarn(`[request ${this.runId}] retry budget exhausted after attempt ${String(attempt)}`);
            }
          },
          onRetry: ({ attempt, delayMs, error }) => {
            this.stats.recordRetry();
            logWarn(
              `[request ${this.runId}] attempt ${String(attempt)} failed (${getErrorMessage(error)}); retrying in ${String(delayMs)}ms`
            );
          },
          policy: this.policy,
          signal: request.signal,
          ...(this.sleep ? { sleep: this.sleep } : {}),
        }
      );

      this.stats.recordSuccess(this.now() - startedAt);
      log(`[request ${this.runId}] succeeded on attempt ${String(lastAttempt)}`);
      return response;
    } catch (error) {
      this.stats.recordFailure();
      if (error instanceof LlmError) {
        throw new LlmError(error.failure, { attempts: lastAttempt, cause: error.cause });
      }
      throw error;
    }
  }

  private async sendOnce(body: string, attempt: number, outerSignal?: AbortSignal): Promise<LlmResponse> {
    this.stats.recordAttempt();
    log(`[request ${this.runId}] attempt ${String(attempt)} POST ${this.url}`);

    const controller = new AbortController();
    const onOuterAbort = (): void => controller.abort(outerSignal?.reason);
    outerSignal?.addEventListener("abort", onOuterAbort, { once: true });
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.requestTimeoutMs);

    try {
      let response: Response;
      let text: string;
      try {
        response = await this.fetchImpl(this.url, {
          body,
          headers: this.getRequestHeaders(),
          method: "POST",
          signal: controller.signal,
        });
        text = await response.text();
      } catch (error) {
        throw this.toTransportError(error, timedOut, outerSignal);
      }

      const failure = classifyHttpStatus({
        body: text,
        retryAfter: response.headers.get("retry-after"),
        status: response.status,
      });
      if (failure) {
        throw new LlmError(failure, { attempts: attempt });
      }

      return parseResponseBody(text);
    } finally {
      clearTimeout(timer);
      outerSignal?.removeEventListener("abort", onOuterAbort);
    }
  }

  private toTransportError(error: unknown, timedOut: boolean, outerSignal?: AbortSignal): unknown {
    if (outerSignal?.aborted) {
      return outerSignal.reason ?? error;
    }

    const failure: LlmFailure = timedOut
      ? { kind: "timeout", seconds: Math.ceil(this.config.requestTimeoutMs / 1000) }
      : { cause: getErrorMessage(error), kind: "network" };
    return new LlmError(failure, { cause: error });
  }

  private getRequestHeaders(): Record<string, string> {
    return {
      "anthropic-version": ANTHROPIC_VERSION,
      "content-type": "application/json",
      "x-api-key": this.config.apiKey,
      "x-request-id": this.runId,
    };
  }
}

export function parseResponseBody(text: string): LlmResponse {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new LlmError({ cause: getErrorMessage(error), kind: "parse" }, { cause: error });
  }

  const parsed = llmResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new LlmError({ cause: parsed.error.message, kind: "parse" }, { cause: parsed.error });
  }

  const normalized = normalizeResponseContent(parsed.data);
  if (!normalized.ok) {
    throw new LlmError({ cause: normalized.reason, kind: "parse" });
  }

  return normalized.response;
}
