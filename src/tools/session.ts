import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import type { LlmMessage } from "../llm/types";

import { getSettingsDirectory } from "../config/settings";
import { getErrorMessage, ToolExecutionError } from "../utils/errors";

export const SNAPSHOT_VERSION = "1.0";
export const SESSIONS_DIRECTORY_NAME = "sessions";

const textBlockSchema = z.object({
  text: z.string(),
  type: z.literal("text"),
});

const toolUseBlockSchema = z.object({
  id: z.string().min(1),
  input: z.record(z.string(), z.unknown()),
  name: z.string().min(1),
  type: z.literal("tool_use"),
});

const toolResultBlockSchema = z.object({
  content: z.string(),
  is_error: z.boolean().optional(),
  tool_use_id: z.string().min(1),
  type: z.literal("tool_result"),
});

export const snapshotMessageSchema = z.object({
  content: z.array(z.discriminatedUnion("type", [textBlockSchema, toolResultBlockSchema, toolUseBlockSchema])),
  role: z.enum(["assistant", "system", "user"]),
});

export const conversationSnapshotSchema = z.object({
  messages: z.array(snapshotMessageSchema),
  metadata: z.object({
    created_at: z.string(),
    model: z.string(),
    version: z.string(),
  }),
});

export type ConversationSnapshot = z.infer<typeof conversationSnapshotSchema>;

export function buildConversationSnapshot(
  messages: LlmMessage[],
  options: { createdAt?: Date; model: string }
): ConversationSnapshot {
  return {
    messages: messages.map((message) => ({ content: [...message.content], role: message.role })),
    metadata: {
      created_at: (options.createdAt ?? new Date()).toISOString(),
      model: options.model,
      version: SNAPSHOT_VERSION,
    },
  };
}

export function getSessionsDirectory(settingsDirectory: string = getSettingsDirectory()): string {
  return join(settingsDirectory, SESSIONS_DIRECTORY_NAME);
}

function toFileTimestamp(isoTimestamp: string): string {
  return isoTimestamp.replace(/[:.]/gu, "-");
}

/**
 * Writes the snapshot as `conversation-<timestamp>.json` and returns its path.
 */
export async function saveConversationSnapshot(
  snapshot: ConversationSnapshot,
  directory: string = getSessionsDirectory()
): Promise<string> {
  const filePath = join(directory, `conversation-${toFileTimestamp(snapshot.metadata.created_at)}.json`);

  try {
    await mkdir(directory, { recursive: true });
    await writeFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
  } catch (error) {
    throw new ToolExecutionError(
      `Failed to save conversation to ${filePath}: ${getErrorMessage(error)}`,
      "io",
      error
    );
  }

  return filePath;
}

export async function loadConversationSnapshot(filePath: string): Promise<ConversationSnapshot> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ToolExecutionError(
      `Failed to read conversation ${filePath}: ${getErrorMessage(error)}`,
      "io",
      error
    );
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new ToolExecutionError(`Conversation file ${filePath} is not valid JSON`, "io", error);
  }

  const parsed = conversationSnapshotSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ToolExecutionError(
      `Conversation file ${filePath} has an unexpected shape: ${parsed.error.message}`,
      "io",
      parsed.error
    );
  }

  return parsed.data;
}
