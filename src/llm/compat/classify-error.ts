export type LlmFailure =
  | { body: string; kind: "http"; status: number }
  | { body: string; kind: "invalid_request" }
  | { body: string; kind: "overloaded" }
  | { cause: string; kind: "network" }
  | { cause: string; kind: "parse" }
  | { kind: "authentication" }
  | { kind: "rate_limit"; retryAfterSeconds: number }
  | { kind: "timeout"; seconds: number };

export type LlmFailureKind = LlmFailure["kind"];

export type FailureDisposition = "permanent" | "retryable";

export const DEFAULT_RETRY_AFTER_SECONDS = 60;

const RETRYABLE_FAILURE_KINDS: ReadonlySet<LlmFailureKind> = new Set([
  "network",
  "overloaded",
  "rate_limit",
  "timeout",
]);

export function getFailureDisposition(failure: LlmFailure): FailureDisposition {
  return RETRYABLE_FAILURE_KINDS.has(failure.kind) ? "retryable" : "permanent";
}

export function parseRetryAfterSeconds(headerValue: null | string | undefined): number {
  if (!headerValue) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  const trimmed = headerValue.trim();
  if (!/^\d+$/u.test(trimmed)) {
    return DEFAULT_RETRY_AFTER_SECONDS;
  }

  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : DEFAULT_RETRY_AFTER_SECONDS;
}

export function classifyHttpStatus(input: {
  body: string;
  retryAfter?: null | string;
  status: number;
}): LlmFailure | undefined {
  if (input.status >= 200 && input.status < 300) {
    return undefined;
  }

  switch (input.status) {
    case 400:
      return { body: input.body, kind: "invalid_request" };
    case 401:
      return { kind: "authentication" };
    case 429:
      return { kind: "rate_limit", retryAfterSeconds: parseRetryAfterSeconds(input.retryAfter) };
    case 529:
      return { body: input.body, kind: "overloaded" };
    default:
      return { body: input.body, kind: "http", status: input.status };
  }
}

export function describeLlmFailure(failure: LlmFailure): string {
  switch (failure.kind) {
    case "authentication":
      return "Authentication failed: invalid API key";
    case "http":
      return `API request failed with status ${String(failure.status)}: ${failure.body}`;
    case "invalid_request":
      return `Invalid request: ${failure.body}`;
    case "network":
      return `Network error: ${failure.cause}`;
    case "overloaded":
      return `Model overloaded: ${failure.body}`;
    case "parse":
      return `Response parsing error: ${failure.cause}`;
    case "rate_limit":
      return `Rate limit exceeded, retry after ${String(failure.retryAfterSeconds)} seconds`;
    case "timeout":
      return `Timeout after ${String(failure.seconds)} seconds`;
  }
}
