import { describe, expect, test } from "vitest";

import { BASE_SYSTEM_PROMPT, buildSystemPrompt } from "../../src/prompts/system";

describe("buildSystemPrompt", () => {
  test("is the base prompt when no environment is known", () => {
    expect(buildSystemPrompt()).toBe(BASE_SYSTEM_PROMPT);
  });

  test("appends the environment section", () => {
    const prompt = buildSystemPrompt({
      allowedRoots: ["/work", "/tmp"],
      availableTools: ["read_file", "list_files"],
      currentDirectory: "/work",
      platform: "linux",
    });

    expect(prompt).toBe(
      `${BASE_SYSTEM_PROMPT}\n\nENVIRONMENT:\nWorking directory: /work\nPlatform: linux\nAllowed directories: /work, /tmp\nAvailable tools: read_file, list_files`
    );
  });
});
