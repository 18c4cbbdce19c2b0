import { z } from "zod";

import type { LlmMessage, LlmResponse, ResponseBlock } from "../types";

export type MessageNormalizationReason = "empty_message_dropped" | "system_role_coercion";

export type MessageNormalizationResult = {
  messages: LlmMessage[];
  reasons: MessageNormalizationReason[];
  system?: string;
};

const responseBlockSchema = z.object({
  id: z.string().optional(),
  input: z.unknown().optional(),
  name: z.string().optional(),
  text: z.string().optional(),
  type: z.string(),
});

export const llmResponseSchema = z.object({
  content: z.array(responseBlockSchema),
  id: z.string().optional(),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number().int().nonnegative().optional(),
      output_tokens: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

export type RawLlmResponse = z.infer<typeof llmResponseSchema>;

function joinText(message: LlmMessage): string {
  return message.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .filter((text) => text.length > 0)
    .join("\n");
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Leading system messages become the top-level `system` field; a system message
 * anywhere else is sent as user text so the wire only ever sees user/assistant roles.
 */
export function normalizeMessagesForTransport(messages: LlmMessage[]): MessageNormalizationResult {
  const reasons = new Set<MessageNormalizationReason>();
  const systemParts: string[] = [];
  const transportMessages: LlmMessage[] = [];
  let inLeadingSystemBlock = true;

  for (const message of messages) {
    if (message.role === "system" && inLeadingSystemBlock) {
      const text = joinText(message);
      if (text) {
        systemParts.push(text);
      }
      continue;
    }

    inLeadingSystemBlock = false;
    if (message.content.length === 0) {
      reasons.add("empty_message_dropped");
      continue;
    }

    if (message.role === "system") {
      reasons.add("system_role_coercion");
      transportMessages.push({ content: message.content, role: "user" });
      continue;
    }

    transportMessages.push(message);
  }

  return {
    messages: transportMessages,
    reasons: Array.from(reasons),
    ...(systemParts.length > 0 ? { system: systemParts.join("\n\n") } : {}),
  };
}

export function normalizeResponseContent(
  raw: RawLlmResponse
): { ok: false; reason: string } | { ok: true; response: LlmResponse } {
  const content: ResponseBlock[] = [];

  for (const [index, block] of raw.content.entries()) {
    if (block.type === "text") {
      if (block.text !== undefined) {
        content.push({ text: block.text, type: "text" });
      }
      continue;
    }

    if (block.type !== "tool_use") {
      continue;
    }

    if (!block.id) {
      return { ok: false, reason: `content[${String(index)}]: tool_use block is missing id` };
    }
    if (!block.name) {
      return { ok: false, reason: `content[${String(index)}]: tool_use block is missing name` };
    }

    const input = block.input ?? {};
    if (!isPlainRecord(input)) {
      return { ok: false, reason: `content[${String(index)}]: tool_use input must be an object` };
    }

    content.push({ id: block.id, input, name: block.name, type: "tool_use" });
  }

  const response: LlmResponse = { content };
  if (raw.id) {
    response.id = raw.id;
  }
  if (raw.stop_reason) {
    response.stopReason = raw.stop_reason;
  }
  if (raw.usage) {
    response.usage = {
      inputTokens: raw.usage.input_tokens ?? 0,
      outputTokens: raw.usage.output_tokens ?? 0,
    };
  }

  return { ok: true, response };
}
