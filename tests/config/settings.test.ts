import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { loadSettings } from "../../src/config/settings";

let base = "";

beforeEach(async () => {
  base = await mkdtemp(join(tmpdir(), "ferrule-settings-"));
});

afterEach(async () => {
  await rm(base, { force: true, recursive: true });
});

describe("loadSettings", () => {
  test("writes default settings on first use", async () => {
    const settings = await loadSettings(base);

    expect(settings).toEqual({
      local: {},
      settingsDirectory: join(base, ".ferrule"),
      user: { autoSave: false, toolsEnabled: true },
    });
    const written: unknown = JSON.parse(await readFile(join(base, ".ferrule", "settings.json"), "utf8"));
    expect(written).toEqual({ autoSave: false, toolsEnabled: true });
  });

  test("reads user and local settings", async () => {
    const directory = join(base, ".ferrule");
    await mkdir(directory);
    await writeFile(
      join(directory, "settings.json"),
      JSON.stringify({ apiBaseUrl: "https://proxy.example.test", autoSave: true, model: "test-model" })
    );
    await writeFile(join(directory, "settings.local.json"), JSON.stringify({ authToken: "test-secret" }));

    const settings = await loadSettings(base);

    expect(settings.user).toEqual({
      apiBaseUrl: "https://proxy.example.test",
      autoSave: true,
      model: "test-model",
      toolsEnabled: true,
    });
    expect(settings.local).toEqual({ authToken: "test-secret" });
  });

  test("falls back to defaults when the settings file is malformed", async () => {
    const directory = join(base, ".ferrule");
    await mkdir(directory);
    await writeFile(join(directory, "settings.json"), "{ not json");
    await writeFile(join(directory, "settings.local.json"), JSON.stringify({ authToken: 42 }));

    const settings = await loadSettings(base);

    expect(settings.user).toEqual({ autoSave: false, toolsEnabled: true });
    expect(settings.local).toEqual({});
    expect(await readFile(join(directory, "settings.json"), "utf8")).toBe("{ not json");
  });
});
