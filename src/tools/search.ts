import { readdir, stat } from "node:fs/promises";
import { isAbsolute, join, posix } from "node:path";
import { minimatch } from "minimatch";
import { z } from "zod";

import type { Dirent } from "node:fs";
import type { Tool, ToolExecutionContext, ToolResult } from "../types/tool";

import { getErrorMessage, ToolExecutionError } from "../utils/errors";
import { logToolCall, logToolResult, logWarn } from "../utils/logger";
import { parseToolArguments, requireValid } from "./arguments";
import {
  validateGlobPattern,
  validatePath,
  type ValidatedPath,
  type ValidatedPattern,
} from "./validation";

export const MAX_LISTED_FILES = 1000;
export const NO_FILES_FOUND = "(no files found)";

const GLOB_MAGIC = /[*?[\]{}!]/u;

const listFilesSchema = z.object({
  path: z.string().optional(),
  pattern: z.string(),
});

type GlobPlan = {
  matcher: string;
  root: ValidatedPath;
};

function splitPatternSegments(pattern: string): string[] {
  return pattern.split(/[\\/]+/u).filter((segment) => segment.length > 0);
}

/**
 * Leading segments of an absolute pattern that contain no glob syntax, e.g.
 * `/srv/app` for `/srv/app/src/*.ts`.
 */
export function getLiteralPrefix(pattern: string): { prefix: string; rest: string } {
  const segments = splitPatternSegments(pattern);
  const firstMagic = segments.findIndex((segment) => GLOB_MAGIC.test(segment));
  const literalCount = firstMagic === -1 ? segments.length : firstMagic;
  const root = pattern.startsWith("/") ? "/" : "";

  return {
    prefix: `${root}${segments.slice(0, literalCount).join("/")}` || "/",
    rest: segments.slice(literalCount).join("/"),
  };
}

function getWalkDepth(matcher: string): number {
  if (matcher.includes("**")) {
    return Number.POSITIVE_INFINITY;
  }
  return splitPatternSegments(matcher).length;
}

/**
 * Walks `root` depth-first, testing each entry against `matcher` as it goes.
 * Stops as soon as `limit` matches are found.
 */
async function collectMatches(root: string, matcher: string, limit: number): Promise<string[]> {
  const maxDepth = getWalkDepth(matcher);
  const matches: string[] = [];
  const pending: Array<{ depth: number; relative: string }> = [{ depth: 0, relative: "" }];

  while (pending.length > 0) {
    const current = pending.pop();
    if (!current || current.depth >= maxDepth) {
      continue;
    }

    const directory = current.relative ? join(root, current.relative) : root;
    let dirents: Dirent[];
    try {
      dirents = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (current.relative === "") {
        throw new ToolExecutionError(
          `Failed to read directory ${directory}: ${getErrorMessage(error)}`,
          "io",
          error
        );
      }
      logWarn(`Skipping unreadable directory ${directory}: ${getErrorMessage(error)}`);
      continue;
    }

    for (const dirent of dirents) {
      const relative = current.relative ? posix.join(current.relative, dirent.name) : dirent.name;
      if (minimatch(relative, matcher, { dot: true })) {
        matches.push(join(root, relative));
        if (matches.length >= limit) {
          return matches;
        }
      }
      // Symlinked directories are listed but not descended into.
      if (dirent.isDirectory()) {
        pending.push({ depth: current.depth + 1, relative });
      }
    }
  }

  return matches;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw new ToolExecutionError(`Failed to inspect ${target}: ${getErrorMessage(error)}`, "io", error);
  }
}

async function planGlob(
  pattern: ValidatedPattern,
  basePath: string,
  allowedRoots?: string[]
): Promise<GlobPlan> {
  const pathOptions = allowedRoots ? { allowedRoots } : {};

  if (isAbsolute(pattern.pattern)) {
    const { prefix, rest } = getLiteralPrefix(pattern.pattern);
    const root = requireValid(await validatePath(prefix, pathOptions));
    return { matcher: rest, root };
  }

  const root = requireValid(await validatePath(basePath, pathOptions));
  return { matcher: pattern.pattern, root };
}

/**
 * Expands a validated glob below a validated base directory. Results are
 * absolute canonical paths in lexical order, at most `MAX_LISTED_FILES`;
 * past the cap, the walk stops early and which entries are kept depends on
 * directory order. Dotfiles match like any other name.
 */
export async function listMatchingFiles(
  pattern: ValidatedPattern,
  basePath: string,
  allowedRoots?: string[]
): Promise<string[]> {
  const plan = await planGlob(pattern, basePath, allowedRoots);

  if (plan.matcher.length === 0) {
    return (await pathExists(plan.root.resolved)) ? [plan.root.resolved] : [];
  }

  // One match past the cap shows whether anything was left out.
  const matches = (await collectMatches(plan.root.resolved, plan.matcher, MAX_LISTED_FILES + 1)).sort();

  if (matches.length > MAX_LISTED_FILES) {
    logWarn(`Too many files found (more than ${String(MAX_LISTED_FILES)}), limiting to ${String(MAX_LISTED_FILES)}`);
    return matches.slice(0, MAX_LISTED_FILES);
  }

  return matches;
}

async function listFiles(args: unknown, context?: ToolExecutionContext): Promise<ToolResult> {
  const { path, pattern } = parseToolArguments("list_files", listFilesSchema, args);
  logToolCall("list_files", { path, pattern });

  const validatedPattern = requireValid(validateGlobPattern(pattern));
  const basePath = path ?? context?.sandbox?.workingDirectory ?? process.cwd();
  const files = await listMatchingFiles(validatedPattern, basePath, context?.sandbox?.allowedRoots);

  logToolResult({ output: `Found ${String(files.length)} entries`, success: true });
  return {
    output: files.length > 0 ? files.join("\n") : NO_FILES_FOUND,
    success: true,
  };
}

export const searchTools: Tool[] = [
  {
    definition: {
      description: "List files in a directory using glob patterns",
      input_schema: {
        properties: {
          path: {
            description: "Base directory path (defaults to current directory)",
            type: "string",
          },
          pattern: {
            description: "Glob pattern (e.g., '*.ts', 'src/**/*.ts')",
            type: "string",
          },
        },
        required: ["pattern"],
        type: "object",
      },
      name: "list_files",
    },
    execute: listFiles,
    name: "list_files",
  },
];
