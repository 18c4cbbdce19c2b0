import type { ContentBlock, LlmMessage, LlmRole } from "../llm/types";

export const MAX_HISTORY_MESSAGES = 50;

function countLeadingSystemMessages(messages: LlmMessage[]): number {
  let count = 0;
  while (count < messages.length && messages[count]?.role === "system") {
    count += 1;
  }
  return count;
}

function carriesToolResult(message: LlmMessage | undefined): boolean {
  return (
    message !== undefined &&
    message.role === "user" &&
    message.content.some((block) => block.type === "tool_result")
  );
}

/**
 * Keeps the leading system messages and the most recent messages so the total
 * is at most `maxMessages`, dropping the middle. The retained tail never opens
 * with a tool result whose tool_use was cut. Trimming twice changes nothing.
 */
export function trimHistory(messages: LlmMessage[], maxMessages: number = MAX_HISTORY_MESSAGES): LlmMessage[] {
  if (messages.length <= maxMessages) {
    return [...messages];
  }

  const systemCount = countLeadingSystemMessages(messages);
  if (systemCount === messages.length) {
    return [...messages];
  }

  const recentCount = Math.max(0, maxMessages - systemCount);
  let start = Math.max(systemCount, messages.length - recentCount);
  while (start < messages.length && carriesToolResult(messages[start])) {
    start += 1;
  }

  return [...messages.slice(0, systemCount), ...messages.slice(start)];
}

export class Memory {
  private messages: LlmMessage[] = [];
  private readonly maxMessages: number;

  constructor(options?: { initialMessages?: LlmMessage[]; maxMessages?: number }) {
    this.maxMessages = options?.maxMessages ?? MAX_HISTORY_MESSAGES;
    this.messages = [...(options?.initialMessages ?? [])];
  }

  addMessage(role: LlmRole, content: ContentBlock[]): void {
    this.messages.push({ content: [...content], role });
  }

  addText(role: LlmRole, text: string): void {
    this.addMessage(role, [{ text, type: "text" }]);
  }

  getMessages(): LlmMessage[] {
    return [...this.messages];
  }

  get length(): number {
    return this.messages.length;
  }

  trim(): number {
    const before = this.messages.length;
    this.messages = trimHistory(this.messages, this.maxMessages);
    return before - this.messages.length;
  }

  clear(): void {
    this.messages = [];
  }
}
