import { z } from "zod";

import type { Tool, ToolExecutionContext, ToolResult } from "../../types/tool";

import { ConfigurationError, getErrorMessage, ToolExecutionError } from "../../utils/errors";
import { log, logToolCall, logToolResult, logWarn } from "../../utils/logger";
import { parseToolArguments, requireValid } from "../arguments";
import { validateCommand, type ValidatedCommand } from "../validation";
import { getShellLabel, runShellProcess, type ShellRunResult } from "./process-lifecycle";

export { runShellProcess, type ShellRunResult } from "./process-lifecycle";

export const DEFAULT_COMMAND_TIMEOUT_MS = 120_000;
export const EMPTY_COMMAND_OUTPUT = "(command produced no output)";

const executeCommandSchema = z.object({
  command: z.string(),
});

export function compileCommandPatterns(patterns: string[]): RegExp[] {
  return patterns.map((pattern) => {
    try {
      return new RegExp(pattern, "u");
    } catch (error) {
      throw new ConfigurationError(
        `Invalid deny command pattern "${pattern}": ${getErrorMessage(error)}`,
        error
      );
    }
  });
}

function buildTerminationMarker(execution: ShellRunResult, timeoutMs: number): string | undefined {
  switch (execution.termination) {
    case "aborted":
      return "[command aborted]";
    case "exited":
      return undefined;
    case "timed_out":
      return `[command timed out after ${String(timeoutMs)}ms and was terminated]`;
  }
}

/**
 * stdout then stderr, separated by a newline only when both have content.
 */
export function renderCommandOutput(stdout: string, stderr: string, marker?: string): string {
  let output = stdout;
  if (stderr.length > 0) {
    output = output.length > 0 ? `${output}\n${stderr}` : stderr;
  }
  if (output.length === 0) {
    output = EMPTY_COMMAND_OUTPUT;
  }

  return marker ? `${output}\n${marker}` : output;
}

export async function runValidatedCommand(
  command: ValidatedCommand,
  context?: ToolExecutionContext
): Promise<ToolResult> {
  const timeoutMs = context?.sandbox?.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  const workingDirectory = context?.sandbox?.workingDirectory ?? process.cwd();

  let execution: ShellRunResult;
  try {
    execution = await runShellProcess({
      ...(context?.abortSignal ? { abortSignal: context.abortSignal } : {}),
      command: command.command,
      timeoutMs,
      workingDirectory,
    });
  } catch (error) {
    throw new ToolExecutionError(
      `Failed to execute command '${command.command}': ${getErrorMessage(error)}`,
      "io",
      error
    );
  }

  log(`Command ${execution.termination} after ${String(execution.durationMs)}ms: ${command.command}`);
  if (execution.exitCode !== 0) {
    logWarn(
      `Command exited with ${execution.exitCode === null ? `signal ${String(execution.signal)}` : `code ${String(execution.exitCode)}`}: ${command.command}`
    );
  }

  const output = renderCommandOutput(
    execution.stdout,
    execution.stderr,
    buildTerminationMarker(execution, timeoutMs)
  );
  logToolResult({ output, success: true });

  return {
    output,
    success: true,
  };
}

async function executeCommand(args: unknown, context?: ToolExecutionContext): Promise<ToolResult> {
  const { command } = parseToolArguments("execute_command", executeCommandSchema, args);
  logToolCall("execute_command", { command, shell: getShellLabel() });

  const validated = requireValid(
    validateCommand(command, { denyPatterns: context?.sandbox?.commandDenyPatterns ?? [] })
  );
  return runValidatedCommand(validated, context);
}

export const shellTools: Tool[] = [
  {
    definition: {
      description:
        "Execute a shell command and return its output. Use for terminal operations like git, npm, make, etc.",
      input_schema: {
        properties: {
          command: {
            description: "The shell command to execute",
            type: "string",
          },
        },
        required: ["command"],
        type: "object",
      },
      name: "execute_command",
    },
    execute: executeCommand,
    name: "execute_command",
  },
];
