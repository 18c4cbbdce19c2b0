import { createReadStream } from "node:fs";
import { mkdir, open, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { FileDecodeError, getErrorMessage, ToolExecutionError } from "../utils/errors";
import { logWarn } from "../utils/logger";

export const SMALL_FILE_THRESHOLD_BYTES = 1024 * 1024;
export const MEDIUM_FILE_THRESHOLD_BYTES = 50 * 1024 * 1024;
export const STREAM_BUFFER_BYTES = 64 * 1024;
export const LARGE_FILE_CHUNK_BYTES = 8 * 1024;
export const LARGE_FILE_READ_CAP_BYTES = 10 * 1024 * 1024;

export type ReadStrategy = "buffered" | "chunked" | "whole";
export type WriteStrategy = "chunked" | "whole";

export type TieredReadResult = {
  bytesRead: number;
  content: string;
  strategy: ReadStrategy;
  truncated: boolean;
};

export type TieredWriteResult = {
  bytesWritten: number;
  strategy: WriteStrategy;
};

export type TieredReadOptions = {
  largeFileCapBytes?: number;
};

function decodeStrict(filePath: string, bytes: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    throw new FileDecodeError(filePath, error);
  }
}

/**
 * Largest prefix length of `bytes` that does not end inside a multi-byte
 * UTF-8 sequence.
 */
export function utf8SafeLength(bytes: Uint8Array): number {
  const length = bytes.length;
  for (let back = 1; back <= Math.min(4, length); back += 1) {
    const index = length - back;
    const byte = bytes[index] ?? 0;
    if ((byte & 0xc0) === 0x80) {
      continue;
    }

    let expected = 1;
    if ((byte & 0xe0) === 0xc0) {
      expected = 2;
    } else if ((byte & 0xf0) === 0xe0) {
      expected = 3;
    } else if ((byte & 0xf8) === 0xf0) {
      expected = 4;
    }
    return back < expected ? index : length;
  }

  return length;
}

function toIoError(action: string, filePath: string, error: unknown): ToolExecutionError {
  if (error instanceof ToolExecutionError) {
    return error;
  }
  return new ToolExecutionError(`Failed to ${action} ${filePath}: ${getErrorMessage(error)}`, "io", error);
}

async function readWhole(filePath: string): Promise<Uint8Array> {
  const handle = await open(filePath, "r");
  try {
    return await handle.readFile();
  } finally {
    await handle.close();
  }
}

async function readBuffered(filePath: string): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  const stream = createReadStream(filePath, { highWaterMark: STREAM_BUFFER_BYTES });
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

async function readChunked(filePath: string, capBytes: number): Promise<Uint8Array> {
  const handle = await open(filePath, "r");
  try {
    const target = Buffer.alloc(capBytes);
    let offset = 0;
    while (offset < capBytes) {
      const length = Math.min(LARGE_FILE_CHUNK_BYTES, capBytes - offset);
      const { bytesRead } = await handle.read(target, offset, length, offset);
      if (bytesRead === 0) {
        break;
      }
      offset += bytesRead;
    }
    return target.subarray(0, offset);
  } finally {
    await handle.close();
  }
}

/**
 * Reads a file with a strategy picked by its size: a single read up to 1 MB,
 * a 64 KB buffered stream up to 50 MB, and 8 KB chunks beyond that, stopping
 * at the large-file cap. Content is always decoded as strict UTF-8.
 */
export async function readFileTiered(
  filePath: string,
  options: TieredReadOptions = {}
): Promise<TieredReadResult> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (error) {
    throw toIoError("read", filePath, error);
  }

  if (size === 0) {
    return { bytesRead: 0, content: "", strategy: "whole", truncated: false };
  }

  const capBytes = options.largeFileCapBytes ?? LARGE_FILE_READ_CAP_BYTES;
  let strategy: ReadStrategy;
  let bytes: Uint8Array;
  try {
    if (size <= SMALL_FILE_THRESHOLD_BYTES) {
      strategy = "whole";
      bytes = await readWhole(filePath);
    } else if (size <= MEDIUM_FILE_THRESHOLD_BYTES) {
      strategy = "buffered";
      bytes = await readBuffered(filePath);
    } else {
      strategy = "chunked";
      bytes = await readChunked(filePath, capBytes);
    }
  } catch (error) {
    throw toIoError("read", filePath, error);
  }

  const truncated = strategy === "chunked" && size > bytes.length;
  if (truncated) {
    bytes = bytes.subarray(0, utf8SafeLength(bytes));
    logWarn(
      `Large file ${filePath} truncated: read ${String(bytes.length)} of ${String(size)} bytes`
    );
  }

  return {
    bytesRead: bytes.length,
    content: decodeStrict(filePath, bytes),
    strategy,
    truncated,
  };
}

/**
 * Writes `content` as UTF-8. Up to 1 MB goes out in one call; larger content
 * is written through a file handle in 64 KB slices and flushed to disk.
 */
export async function writeFileTiered(filePath: string, content: string): Promise<TieredWriteResult> {
  const bytes = Buffer.from(content, "utf8");

  try {
    if (bytes.length <= SMALL_FILE_THRESHOLD_BYTES) {
      await writeFile(filePath, bytes);
      return { bytesWritten: bytes.length, strategy: "whole" };
    }

    await mkdir(dirname(filePath), { recursive: true });
    const handle = await open(filePath, "w");
    try {
      let offset = 0;
      while (offset < bytes.length) {
        const end = Math.min(offset + STREAM_BUFFER_BYTES, bytes.length);
        const { bytesWritten } = await handle.write(bytes, offset, end - offset);
        offset += bytesWritten;
      }
      await handle.sync();
    } finally {
      await handle.close();
    }
    return { bytesWritten: bytes.length, strategy: "chunked" };
  } catch (error) {
    throw toIoError("write", filePath, error);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

/**
 * Lazily yields the lines of a file. The sequence cannot be rewound; iterate
 * again to reopen the file. Breaking out of the loop closes the file.
 */
export async function* readLines(filePath: string): AsyncGenerator<string, void, undefined> {
  const stream = createReadStream(filePath, { highWaterMark: STREAM_BUFFER_BYTES });
  const decoder = new TextDecoder("utf-8", { fatal: true });
  let pending = "";

  try {
    for await (const chunk of stream) {
      const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      try {
        pending += decoder.decode(bytes, { stream: true });
      } catch (error) {
        throw new FileDecodeError(filePath, error);
      }

      let newlineIndex = pending.indexOf("\n");
      while (newlineIndex !== -1) {
        yield stripCarriageReturn(pending.slice(0, newlineIndex));
        pending = pending.slice(newlineIndex + 1);
        newlineIndex = pending.indexOf("\n");
      }
    }

    try {
      pending += decoder.decode();
    } catch (error) {
      throw new FileDecodeError(filePath, error);
    }
    if (pending.length > 0) {
      yield stripCarriageReturn(pending);
    }
  } catch (error) {
    throw toIoError("read lines from", filePath, error);
  } finally {
    stream.destroy();
  }
}

/**
 * Feeds each line to `handler` in order, awaiting it before reading on. A
 * handler error stops the stream and closes the file. Resolves to the number
 * of lines handled.
 */
export async function streamLines(
  filePath: string,
  handler: (line: string, index: number) => Promise<void> | void
): Promise<number> {
  let processed = 0;
  for await (const line of readLines(filePath)) {
    await handler(line, processed);
    processed += 1;
  }
  return processed;
}
