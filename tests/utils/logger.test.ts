import { afterEach, describe, expect, test, vi } from "vitest";

import { initializeLogger, isVerbose, log, logError, logStep, logToolResult, logWarn } from "../../src/utils/logger";

afterEach(() => {
  initializeLogger({ verbose: false });
  vi.restoreAllMocks();
});

describe("logger", () => {
  test("debug output is silent unless verbose", () => {
    const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);

    log("hidden");
    initializeLogger({ verbose: true });
    log("shown");
    logStep(2, "calling model");
    logToolResult({ output: "x".repeat(150), success: false });

    expect(isVerbose()).toBe(true);
    expect(stdout.mock.calls).toEqual([
      ["[LOG] shown"],
      ["[STEP 2] calling model"],
      [`[TOOL RESULT] ✗ ${"x".repeat(100)}`],
    ]);
  });

  test("warnings and errors always go to stderr", () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logWarn("careful");
    logError("broken", new Error("cause"));

    expect(stderr.mock.calls).toEqual([["[WARN] careful"], ["[ERROR] broken"]]);
  });
});
