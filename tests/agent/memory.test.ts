import { describe, expect, test } from "vitest";

import type { LlmMessage } from "../../src/llm/types";

import { Memory, trimHistory } from "../../src/agent/memory";

const text = (role: LlmMessage["role"], value: string): LlmMessage => ({
  content: [{ text: value, type: "text" }],
  role,
});

const conversation: LlmMessage[] = [
  text("system", "rules"),
  text("user", "q1"),
  { content: [{ id: "t1", input: {}, name: "read_file", type: "tool_use" }], role: "assistant" },
  { content: [{ content: "file body", tool_use_id: "t1", type: "tool_result" }], role: "user" },
  text("assistant", "done"),
  text("user", "q2"),
  text("assistant", "r2"),
];

describe("trimHistory", () => {
  test("returns a copy when under the limit", () => {
    const trimmed = trimHistory(conversation, 50);

    expect(trimmed).toEqual(conversation);
    expect(trimmed).not.toBe(conversation);
  });

  test("keeps the system prefix and skips an orphaned tool result at the cut", () => {
    const trimmed = trimHistory(conversation, 5);

    expect(trimmed).toEqual([
      text("system", "rules"),
      text("assistant", "done"),
      text("user", "q2"),
      text("assistant", "r2"),
    ]);
  });

  test("is idempotent", () => {
    const once = trimHistory(conversation, 5);

    expect(trimHistory(once, 5)).toEqual(once);
  });

  test("never drops system messages even past the limit", () => {
    const systemOnly = ["a", "b", "c", "d", "e"].map((value) => text("system", value));

    expect(trimHistory(systemOnly, 2)).toEqual(systemOnly);
  });
});

describe("Memory", () => {
  test("trim reports how many messages were dropped", () => {
    const memory = new Memory({ maxMessages: 3 });
    for (const value of ["m1", "m2", "m3", "m4", "m5"]) {
      memory.addText(value.endsWith("2") || value.endsWith("4") ? "assistant" : "user", value);
    }

    expect(memory.trim()).toBe(2);
    expect(memory.getMessages()).toEqual([text("user", "m3"), text("assistant", "m4"), text("user", "m5")]);
    expect(memory.trim()).toBe(0);
  });

  test("hands out copies of its history", () => {
    const memory = new Memory({ initialMessages: [text("user", "hello")] });

    memory.getMessages().pop();

    expect(memory.length).toBe(1);
    memory.clear();
    expect(memory.length).toBe(0);
  });
});
