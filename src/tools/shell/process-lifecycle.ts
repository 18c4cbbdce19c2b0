import { spawn } from "node:child_process";
import { Readable } from "node:stream";

import type { AbortSignalLike } from "../../types/tool";

type ProcessSignal = Exclude<Parameters<typeof process.kill>[1], number | undefined>;

export type ShellTermination = "aborted" | "exited" | "timed_out";

export interface ShellRunResult {
  durationMs: number;
  exitCode: null | number;
  signal: null | ProcessSignal;
  stderr: string;
  stdout: string;
  termination: ShellTermination;
}

export interface ShellRunInput {
  abortSignal?: AbortSignalLike;
  command: string;
  timeoutMs: number;
  workingDirectory: string;
}

const FORCE_KILL_GRACE_MS = 1_000;
const IS_WINDOWS = process.platform === "win32";

export function getShellLabel(): string {
  return IS_WINDOWS ? "cmd" : "sh";
}

function shellArguments(command: string): string[] {
  return IS_WINDOWS ? ["/C", command] : ["-c", command];
}

function drain(stream: Readable): Promise<string> {
  return new Promise((resolveText, rejectText) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer | string) => {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
    stream.once("error", rejectText);
    // Invalid UTF-8 in command output is replaced, not rejected.
    stream.once("end", () => resolveText(Buffer.concat(chunks).toString("utf8")));
  });
}

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ESRCH";
}

function signalPosix(pid: number, signal: ProcessSignal): void {
  // The child leads its own process group, so -pid reaches its descendants too.
  for (const target of [-pid, pid]) {
    try {
      process.kill(target, signal);
      return;
    } catch (error) {
      if (isMissingProcess(error)) {
        return;
      }
    }
  }
}

function taskkill(pid: number, force: boolean): Promise<void> {
  return new Promise((resolveKill) => {
    const killer = spawn("taskkill", ["/PID", String(pid), "/T", ...(force ? ["/F"] : [])], {
      stdio: "ignore",
      windowsHide: true,
    });
    killer.once("error", () => resolveKill());
    killer.once("exit", () => resolveKill());
  });
}

async function signalTree(pid: number | undefined, signal: ProcessSignal): Promise<void> {
  if (pid === undefined || pid <= 0) {
    return;
  }
  if (IS_WINDOWS) {
    await taskkill(pid, signal === "SIGKILL");
    return;
  }
  signalPosix(pid, signal);
}

/**
 * Runs `command` through the platform shell and collects both streams. On
 * timeout or abort the whole process tree gets SIGTERM, then SIGKILL after a
 * grace period; output produced before that is kept.
 */
export async function runShellProcess(input: ShellRunInput): Promise<ShellRunResult> {
  const startedAt = Date.now();
  const child = spawn(getShellLabel(), shellArguments(input.command), {
    cwd: input.workingDirectory,
    detached: !IS_WINDOWS,
    stdio: "pipe",
    windowsHide: true,
  });
  const stdout = drain(child.stdout);
  const stderr = drain(child.stderr);

  let termination: ShellTermination = "exited";
  let settled = false;
  const timers: Array<ReturnType<typeof setTimeout>> = [];

  const terminate = (reason: Exclude<ShellTermination, "exited">): void => {
    if (termination !== "exited") {
      return;
    }
    termination = reason;
    void signalTree(child.pid, "SIGTERM").then(() => {
      if (settled) {
        return;
      }
      timers.push(setTimeout(() => void signalTree(child.pid, "SIGKILL"), FORCE_KILL_GRACE_MS));
    });
  };

  if (input.timeoutMs > 0) {
    timers.push(setTimeout(() => terminate("timed_out"), input.timeoutMs));
  }
  const onAbort = (): void => terminate("aborted");
  if (input.abortSignal?.aborted) {
    onAbort();
  } else {
    input.abortSignal?.addEventListener("abort", onAbort, { once: true });
  }

  try {
    const exit = await new Promise<{ exitCode: null | number; signal: null | ProcessSignal }>(
      (resolveExit, rejectExit) => {
        child.once("error", rejectExit);
        child.once("close", (exitCode, signal) => resolveExit({ exitCode, signal }));
      }
    );
    const [stdoutText, stderrText] = await Promise.all([stdout, stderr]);

    return {
      durationMs: Math.max(0, Date.now() - startedAt),
      exitCode: exit.exitCode,
      signal: exit.signal,
      stderr: stderrText,
      stdout: stdoutText,
      termination,
    };
  } finally {
    settled = true;
    for (const timer of timers) {
      clearTimeout(timer);
    }
    input.abortSignal?.removeEventListener("abort", onAbort);
  }
}

export type { ProcessSignal };
