import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

import type { Tool, ToolExecutionContext, ToolResult } from "../types/tool";

import { getErrorMessage, ToolExecutionError } from "../utils/errors";
import { log, logToolCall, logToolResult } from "../utils/logger";
import { parseToolArguments, requireValid } from "./arguments";
import { readFileTiered, SMALL_FILE_THRESHOLD_BYTES, writeFileTiered } from "./file-io";
import { checkFilePermissions, validatePath, type ValidatedPath } from "./validation";

export const MAX_READ_CONTENT_BYTES = 10 * 1024 * 1024;
export const MAX_WRITE_CONTENT_BYTES = 50 * 1024 * 1024;

const readFileSchema = z.object({
  file_path: z.string(),
});

const writeFileSchema = z.object({
  content: z.string(),
  file_path: z.string(),
});

function pathOptions(context?: ToolExecutionContext): { allowedRoots?: string[] } {
  const allowedRoots = context?.sandbox?.allowedRoots;
  return allowedRoots ? { allowedRoots } : {};
}

export async function readValidatedFile(path: ValidatedPath): Promise<ToolResult> {
  requireValid(await checkFilePermissions(path));

  const result = await readFileTiered(path.resolved);
  const contentBytes = Buffer.byteLength(result.content, "utf8");
  if (contentBytes > MAX_READ_CONTENT_BYTES) {
    throw new ToolExecutionError(
      `File content too large: ${String(contentBytes)} bytes (${path.resolved})`,
      "too_large"
    );
  }
  if (contentBytes > SMALL_FILE_THRESHOLD_BYTES) {
    log(`Processing large file: ${String(contentBytes)} bytes (${result.strategy} read)`);
  }

  logToolResult({ output: `Read ${String(result.bytesRead)} bytes`, success: true });
  return {
    output: result.content,
    success: true,
  };
}

export async function writeValidatedFile(path: ValidatedPath, content: string): Promise<ToolResult> {
  const contentBytes = Buffer.byteLength(content, "utf8");
  if (contentBytes > MAX_WRITE_CONTENT_BYTES) {
    throw new ToolExecutionError(`Content too large: ${String(contentBytes)} bytes`, "too_large");
  }

  const parent = dirname(path.resolved);
  try {
    await mkdir(parent, { recursive: true });
  } catch (error) {
    throw new ToolExecutionError(
      `Failed to create directory ${parent}: ${getErrorMessage(error)}`,
      "io",
      error
    );
  }

  const result = await writeFileTiered(path.resolved, content);
  logToolResult({ output: `Wrote ${String(result.bytesWritten)} bytes to ${path.resolved}`, success: true });

  return {
    output: `Successfully wrote to file: ${path.resolved}`,
    success: true,
  };
}

async function readFile(args: unknown, context?: ToolExecutionContext): Promise<ToolResult> {
  const { file_path: filePath } = parseToolArguments("read_file", readFileSchema, args);
  logToolCall("read_file", { file_path: filePath });

  const path = requireValid(await validatePath(filePath, pathOptions(context)));
  return readValidatedFile(path);
}

async function writeFile(args: unknown, context?: ToolExecutionContext): Promise<ToolResult> {
  const { content, file_path: filePath } = parseToolArguments("write_file", writeFileSchema, args);
  logToolCall("write_file", { contentLength: content.length, file_path: filePath });

  const path = requireValid(await validatePath(filePath, pathOptions(context)));
  return writeValidatedFile(path, content);
}

export const fsTools: Tool[] = [
  {
    definition: {
      description: "Read a file from the filesystem. Returns the file contents as a string.",
      input_schema: {
        properties: {
          file_path: {
            description: "Absolute path to the file to read",
            type: "string",
          },
        },
        required: ["file_path"],
        type: "object",
      },
      name: "read_file",
    },
    execute: readFile,
    name: "read_file",
  },
  {
    definition: {
      description: "Write content to a file, overwriting if it exists. Returns confirmation message.",
      input_schema: {
        properties: {
          content: {
            description: "Content to write to the file",
            type: "string",
          },
          file_path: {
            description: "Absolute path to the file to write",
            type: "string",
          },
        },
        required: ["file_path", "content"],
        type: "object",
      },
      name: "write_file",
    },
    execute: writeFile,
    name: "write_file",
  },
];
