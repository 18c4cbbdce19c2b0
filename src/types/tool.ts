import type { LlmToolDefinition } from "../llm/types";

export const TOOL_FAILURE_KINDS = [
  "decode",
  "io",
  "missing_field",
  "rejected",
  "too_large",
  "unknown_tool",
] as const;

export type ToolFailureKind = (typeof TOOL_FAILURE_KINDS)[number];

// Failures the model cannot fix by retrying with other arguments; they end the turn.
export const TURN_ABORTING_FAILURES: ReadonlySet<ToolFailureKind> = new Set(["decode", "unknown_tool"]);

export type ToolResult = {
  error?: string;
  failure?: ToolFailureKind;
  output: string;
  success: boolean;
};

export type ToolCall = {
  input: Record<string, unknown>;
  name: string;
};

export type AbortSignalLike = {
  aborted: boolean;
  addEventListener: (
    type: "abort",
    listener: () => void,
    options?: {
      once?: boolean;
    }
  ) => void;
  removeEventListener: (type: "abort", listener: () => void) => void;
};

export type SandboxOptions = {
  allowedRoots?: string[];
  commandDenyPatterns?: RegExp[];
  commandTimeoutMs?: number;
  workingDirectory?: string;
};

export type ToolExecutionContext = {
  abortSignal?: AbortSignalLike;
  sandbox?: SandboxOptions;
};

export interface Tool {
  definition: LlmToolDefinition;
  execute: (_args: unknown, _context?: ToolExecutionContext) => Promise<ToolResult>;
  name: string;
}
