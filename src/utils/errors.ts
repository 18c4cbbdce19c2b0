import type { LlmFailure } from "../llm/compat";
import type { ToolFailureKind } from "../types/tool";

import { describeLlmFailure, getFailureDisposition, type FailureDisposition } from "../llm/compat";

export class AgentError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.code = code;
    this.cause = cause;
    this.name = "AgentError";
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export class ToolExecutionError extends AgentError {
  public readonly failure: ToolFailureKind;

  constructor(message: string, failure: ToolFailureKind = "io", cause?: unknown) {
    super(message, "TOOL_EXECUTION_ERROR", cause);
    this.failure = failure;
    this.name = "ToolExecutionError";
  }
}

export class ValidationError extends ToolExecutionError {
  constructor(message: string, cause?: unknown) {
    super(message, "rejected", cause);
    this.name = "ValidationError";
  }
}

export class FileDecodeError extends ToolExecutionError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(`File contains invalid UTF-8: ${filePath}`, "decode", cause);
    this.filePath = filePath;
    this.name = "FileDecodeError";
  }
}

export class LlmError extends AgentError {
  public readonly attempts: number;
  public readonly disposition: FailureDisposition;
  public readonly failure: LlmFailure;

  constructor(failure: LlmFailure, options?: { attempts?: number; cause?: unknown; message?: string }) {
    super(options?.message ?? describeLlmFailure(failure), "LLM_ERROR", options?.cause);
    this.name = "LlmError";
    this.attempts = options?.attempts ?? 1;
    this.disposition = getFailureDisposition(failure);
    this.failure = failure;
  }

  get retryable(): boolean {
    return this.disposition === "retryable";
  }
}

export class TurnTimeoutError extends AgentError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, cause?: unknown) {
    super(`Turn timed out after ${String(timeoutMs)}ms`, "TURN_TIMEOUT", cause);
    this.timeoutMs = timeoutMs;
    this.name = "TurnTimeoutError";
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
