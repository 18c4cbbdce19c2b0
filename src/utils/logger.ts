import type { AgentConfig } from "../types/config";

type Sink = "stderr" | "stdout";

const RESULT_PREVIEW_CHARS = 100;

let verbose = false;

export function initializeLogger(config: Pick<AgentConfig, "verbose">): void {
  verbose = config.verbose;
}

export function isVerbose(): boolean {
  return verbose;
}

function emit(sink: Sink, tag: string, message: string, ...details: unknown[]): void {
  const line = `[${tag}] ${message}`;
  if (sink === "stderr") {
    console.error(line, ...details);
  } else {
    console.log(line, ...details);
  }
}

// Debug output; silent unless verbose.
export function log(message: string): void {
  if (verbose) {
    emit("stdout", "LOG", message);
  }
}

export function logStep(step: number, message: string): void {
  if (verbose) {
    emit("stdout", `STEP ${String(step)}`, message);
  }
}

export function logToolCall(name: string, args: unknown): void {
  if (verbose) {
    emit("stdout", "TOOL", name, args);
  }
}

export function logToolResult(result: { output: string; success: boolean }): void {
  if (verbose) {
    emit("stdout", "TOOL RESULT", `${result.success ? "✓" : "✗"} ${result.output.slice(0, RESULT_PREVIEW_CHARS)}`);
  }
}

// Warnings and errors always reach stderr.
export function logWarn(message: string): void {
  emit("stderr", "WARN", message);
}

export function logError(message: string, error?: unknown): void {
  emit("stderr", "ERROR", message);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
}
