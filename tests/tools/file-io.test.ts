import { mkdtemp, open, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import {
  LARGE_FILE_READ_CAP_BYTES,
  readFileTiered,
  readLines,
  streamLines,
  utf8SafeLength,
  writeFileTiered,
} from "../../src/tools/file-io";
import { FileDecodeError, ToolExecutionError } from "../../src/utils/errors";

let root = "";

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "ferrule-file-io-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(root, { force: true, recursive: true });
});

const SPARSE_FILE_BYTES = 60 * 1024 * 1024;

// Sparse, so the size costs no disk; the holes read back as zero bytes.
async function createSparseFile(
  filePath: string,
  size: number,
  tail?: { bytes: Buffer; offset: number }
): Promise<void> {
  const handle = await open(filePath, "w");
  try {
    await handle.truncate(size);
    if (tail) {
      await handle.write(tail.bytes, 0, tail.bytes.length, tail.offset);
    }
  } finally {
    await handle.close();
  }
}

describe("tiered write then read", () => {
  test("empty content round-trips as an empty string", async () => {
    const filePath = join(root, "empty.txt");

    const written = await writeFileTiered(filePath, "");
    const read = await readFileTiered(filePath);

    expect(written).toEqual({ bytesWritten: 0, strategy: "whole" });
    expect(read).toEqual({ bytesRead: 0, content: "", strategy: "whole", truncated: false });
  });

  test("1 KB content uses whole-file reads and writes", async () => {
    const filePath = join(root, "small.txt");
    const content = "é".repeat(512);

    const written = await writeFileTiered(filePath, content);
    const read = await readFileTiered(filePath);

    expect(written).toEqual({ bytesWritten: 1024, strategy: "whole" });
    expect(read.strategy).toBe("whole");
    expect(read.content).toBe(content);
  });

  test("2 MB content uses chunked writes and buffered reads", async () => {
    const filePath = join(root, "nested", "dir", "medium.txt");
    const content = "0123456789abcdef".repeat(128 * 1024);

    const written = await writeFileTiered(filePath, content);
    const read = await readFileTiered(filePath);

    expect(written).toEqual({ bytesWritten: 2 * 1024 * 1024, strategy: "chunked" });
    expect(read.strategy).toBe("buffered");
    expect(read.bytesRead).toBe(2 * 1024 * 1024);
    expect(read.content === content).toBe(true);
  });
});

describe("readFileTiered", () => {
  test("rejects invalid UTF-8 with the file named", async () => {
    const filePath = join(root, "binary.bin");
    await writeFile(filePath, Buffer.from([0x66, 0x6f, 0xff, 0xfe]));

    await expect(readFileTiered(filePath)).rejects.toThrow(new FileDecodeError(filePath).message);
    await expect(readFileTiered(filePath)).rejects.toBeInstanceOf(FileDecodeError);
  });

  test("wraps a missing file as an io failure", async () => {
    const filePath = join(root, "missing.txt");

    const error: unknown = await readFileTiered(filePath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ToolExecutionError);
    if (error instanceof ToolExecutionError) {
      expect(error.failure).toBe("io");
      expect(error.message).toContain(filePath);
    }
  });
});

describe("large file reads", () => {
  test("files over 50 MB are read in chunks up to the 10 MB cap", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const filePath = join(root, "huge.bin");
    await createSparseFile(filePath, SPARSE_FILE_BYTES);

    const read = await readFileTiered(filePath);

    expect(read.strategy).toBe("chunked");
    expect(read.truncated).toBe(true);
    expect(read.bytesRead).toBe(LARGE_FILE_READ_CAP_BYTES);
    expect(read.content.length).toBe(LARGE_FILE_READ_CAP_BYTES);
    expect(stderr.mock.calls).toEqual([
      [`[WARN] Large file ${filePath} truncated: read 10485760 of 62914560 bytes`],
    ]);
  });

  test("the cut backs off a character that straddles the cap", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const filePath = join(root, "straddle.bin");
    // The 3-byte euro sign starts on the last byte inside the cap.
    await createSparseFile(filePath, SPARSE_FILE_BYTES, {
      bytes: Buffer.from("€", "utf8"),
      offset: LARGE_FILE_READ_CAP_BYTES - 1,
    });

    const read = await readFileTiered(filePath);

    expect(read.truncated).toBe(true);
    expect(read.bytesRead).toBe(LARGE_FILE_READ_CAP_BYTES - 1);
    expect(read.content.length).toBe(LARGE_FILE_READ_CAP_BYTES - 1);
    expect(read.content.endsWith("\u0000")).toBe(true);
  });

  test("a file of exactly 50 MB is still buffered whole", async () => {
    const filePath = join(root, "edge.bin");
    await createSparseFile(filePath, 50 * 1024 * 1024);

    const read = await readFileTiered(filePath);

    expect(read.strategy).toBe("buffered");
    expect(read.truncated).toBe(false);
    expect(read.bytesRead).toBe(50 * 1024 * 1024);
  });
});

describe("utf8SafeLength", () => {
  test("drops an incomplete trailing sequence only", () => {
    const euro = Buffer.from("a€", "utf8");

    expect(utf8SafeLength(euro)).toBe(4);
    expect(utf8SafeLength(euro.subarray(0, 3))).toBe(1);
    expect(utf8SafeLength(euro.subarray(0, 2))).toBe(1);
    expect(utf8SafeLength(Buffer.from("abc"))).toBe(3);
    expect(utf8SafeLength(Buffer.alloc(0))).toBe(0);
  });
});

describe("line streaming", () => {
  test("yields lines without terminators", async () => {
    const filePath = join(root, "lines.txt");
    await writeFile(filePath, "alpha\r\nbeta\ngamma");

    const lines: string[] = [];
    for await (const line of readLines(filePath)) {
      lines.push(line);
    }

    expect(lines).toEqual(["alpha", "beta", "gamma"]);
  });

  test("streamLines counts handled lines", async () => {
    const filePath = join(root, "count.txt");
    await writeFile(filePath, "one\ntwo\nthree\n");

    const seen: string[] = [];
    const processed = await streamLines(filePath, (line, index) => {
      seen.push(`${String(index)}:${line}`);
    });

    expect(processed).toBe(3);
    expect(seen).toEqual(["0:one", "1:two", "2:three"]);
  });

  test("a handler error stops the stream immediately", async () => {
    const filePath = join(root, "abort.txt");
    await writeFile(filePath, "first\nsecond\nthird\n");

    const seen: string[] = [];
    const run = streamLines(filePath, (line) => {
      seen.push(line);
      if (line === "second") {
        throw new Error("handler stop");
      }
    });

    await expect(run).rejects.toThrow("handler stop");
    expect(seen).toEqual(["first", "second"]);
    // The file handle was released, so the file can be replaced.
    await writeFile(filePath, "replaced");
    expect(await readFile(filePath, "utf8")).toBe("replaced");
  });

  test("rejects invalid UTF-8 lines", async () => {
    const filePath = join(root, "bad-lines.txt");
    await writeFile(filePath, Buffer.concat([Buffer.from("ok\n"), Buffer.from([0xc3, 0x28]), Buffer.from("\n")]));

    const seen: string[] = [];
    await expect(
      streamLines(filePath, (line) => {
        seen.push(line);
      })
    ).rejects.toBeInstanceOf(FileDecodeError);
  });
});
