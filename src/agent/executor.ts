import type { ToolCall, ToolExecutionContext, ToolResult } from "../types/tool";

import { getToolByName } from "../tools";
import { getErrorMessage, ToolExecutionError } from "../utils/errors";
import { log, logError } from "../utils/logger";

function toFailureResult(toolName: string, error: unknown): ToolResult {
  if (error instanceof ToolExecutionError) {
    return {
      error: error.message,
      failure: error.failure,
      output: "",
      success: false,
    };
  }

  logError(`Unexpected error from tool ${toolName}`, error);
  return {
    error: `Tool ${toolName} failed: ${getErrorMessage(error)}`,
    failure: "io",
    output: "",
    success: false,
  };
}

/**
 * Runs one model-requested tool. Never throws: unknown tools, invalid input and
 * execution errors all come back as a failed `ToolResult` with a failure kind.
 */
export async function executeToolCall(
  toolCall: ToolCall,
  context?: ToolExecutionContext
): Promise<ToolResult> {
  log(`Executing tool: ${toolCall.name}`);

  const tool = getToolByName(toolCall.name);
  if (!tool) {
    return {
      error: `Unknown tool: ${toolCall.name}`,
      failure: "unknown_tool",
      output: "",
      success: false,
    };
  }

  try {
    return await tool.execute(toolCall.input, context);
  } catch (error) {
    return toFailureResult(toolCall.name, error);
  }
}
