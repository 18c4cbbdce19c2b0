import { mkdir, mkdtemp, readdir, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { requireValid } from "../../src/tools/arguments";
import { getLiteralPrefix, listMatchingFiles, MAX_LISTED_FILES } from "../../src/tools/search";
import { validateGlobPattern } from "../../src/tools/validation";

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

let root = "";

beforeEach(async () => {
  root = await realpath(await mkdtemp(join(tmpdir(), "ferrule-search-")));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { force: true, recursive: true });
});

describe("getLiteralPrefix", () => {
  test("splits an absolute pattern at its first glob segment", () => {
    expect(getLiteralPrefix("/srv/app/src/*.ts")).toEqual({ prefix: "/srv/app/src", rest: "*.ts" });
    expect(getLiteralPrefix("/*.ts")).toEqual({ prefix: "/", rest: "*.ts" });
    expect(getLiteralPrefix("/srv/app/README.md")).toEqual({ prefix: "/srv/app/README.md", rest: "" });
  });
});

describe("listMatchingFiles", () => {
  test("stops walking once one match past the cap is found", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    // 12 directories of 100 matches each: the 1001st match lands in the 11th directory read.
    for (let dir = 0; dir < 12; dir += 1) {
      const directory = join(root, `d${String(dir).padStart(2, "0")}`);
      await mkdir(directory);
      await Promise.all(
        Array.from({ length: 100 }, (_, index) => writeFile(join(directory, `f${String(index)}.rs`), ""))
      );
    }
    vi.mocked(readdir).mockClear();

    const files = await listMatchingFiles(requireValid(validateGlobPattern("**/*.rs")), root, [root]);

    expect(files).toHaveLength(MAX_LISTED_FILES);
    expect(files).toEqual([...files].sort());
    // The base directory plus 11 of the 12 subdirectories.
    expect(vi.mocked(readdir)).toHaveBeenCalledTimes(12);
    expect(stderr.mock.calls).toEqual([["[WARN] Too many files found (more than 1000), limiting to 1000"]]);
  });

  test("walks everything when the matches fit under the cap", async () => {
    await mkdir(join(root, "a"));
    await mkdir(join(root, "b"));
    await writeFile(join(root, "a", "x.rs"), "");
    await writeFile(join(root, "b", "y.rs"), "");
    vi.mocked(readdir).mockClear();

    const files = await listMatchingFiles(requireValid(validateGlobPattern("**/*.rs")), root, [root]);

    expect(files).toEqual([join(root, "a", "x.rs"), join(root, "b", "y.rs")]);
    expect(vi.mocked(readdir)).toHaveBeenCalledTimes(3);
  });
});
