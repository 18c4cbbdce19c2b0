import { lstat, realpath } from "node:fs/promises";
import { homedir } from "node:os";
import { basename, dirname, isAbsolute, join, resolve, sep } from "node:path";

export type ValidationResult<T> = { ok: false; reason: string } | { ok: true; value: T };

export const MAX_COMMAND_LENGTH = 1000;
export const MAX_COMMAND_PIPES = 2;
export const MAX_COMMAND_REDIRECTS = 2;
export const MAX_PATTERN_WILDCARDS = 10;
export const MAX_PERMITTED_FILE_BYTES = 100 * 1024 * 1024;
export const API_KEY_PREFIX = "sk-ant-";
export const API_KEY_MIN_LENGTH = 30;
export const API_KEY_MAX_LENGTH = 100;

const DANGEROUS_PATH_CHARACTERS = ["\0", "<", ">", "|", '"', "\n", "\r"] as const;

// Heuristic only: substring matches, not a shell parser.
export const DENIED_COMMAND_FRAGMENTS = [
  "rm -rf /",
  "sudo rm",
  "format",
  "del /f",
  "shutdown",
  "reboot",
  "halt",
  "poweroff",
  "mkfs",
  "fdisk",
  "dd if=",
] as const;

const DEFAULT_TEMP_ROOTS = ["/tmp", "/var/tmp"];

function reject<T>(reason: string): ValidationResult<T> {
  return { ok: false, reason };
}

function accept<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

function countOccurrences(value: string, character: string): number {
  let count = 0;
  for (const current of value) {
    if (current === character) {
      count += 1;
    }
  }
  return count;
}

function describeCharacter(character: string): string {
  return JSON.stringify(character);
}

/**
 * A path that passed `validatePath`. `requested` is what the caller asked for;
 * `resolved` is its canonical form inside an allowed root and is what tools
 * operate on.
 */
export class ValidatedPath {
  private constructor(
    readonly requested: string,
    readonly resolved: string
  ) {}

  static create(requested: string, resolved: string): ValidatedPath {
    return new ValidatedPath(requested, resolved);
  }

  toString(): string {
    return this.resolved;
  }
}

export class ValidatedCommand {
  private constructor(readonly command: string) {}

  static create(command: string): ValidatedCommand {
    return new ValidatedCommand(command);
  }

  toString(): string {
    return this.command;
  }
}

export class ValidatedPattern {
  private constructor(readonly pattern: string) {}

  static create(pattern: string): ValidatedPattern {
    return new ValidatedPattern(pattern);
  }

  toString(): string {
    return this.pattern;
  }
}

export class ValidatedKey {
  private constructor(readonly key: string) {}

  static create(key: string): ValidatedKey {
    return new ValidatedKey(key);
  }

  // Keeps the key out of accidental string interpolation.
  toString(): string {
    return `${this.key.slice(0, API_KEY_PREFIX.length)}…`;
  }
}

export type PathValidationOptions = {
  allowedRoots?: string[];
};

export type CommandValidationOptions = {
  denyPatterns?: RegExp[];
};

async function canonicalize(target: string): Promise<string> {
  const absolute = resolve(target);
  const pending: string[] = [];
  let current = absolute;

  while (true) {
    try {
      const real = await realpath(current);
      return pending.length > 0 ? join(real, ...pending.reverse()) : real;
    } catch {
      const parent = dirname(current);
      if (parent === current) {
        return absolute;
      }
      pending.push(basename(current));
      current = parent;
    }
  }
}

export function getDefaultAllowedRoots(): string[] {
  return [process.cwd(), homedir(), ...DEFAULT_TEMP_ROOTS];
}

async function resolveAllowedRoots(roots: string[]): Promise<string[]> {
  const canonicalRoots = await Promise.all(roots.map((root) => canonicalize(root)));
  return Array.from(new Set(canonicalRoots));
}

export function isWithinRoot(candidate: string, root: string): boolean {
  if (candidate === root) {
    return true;
  }

  const prefix = root.endsWith(sep) ? root : `${root}${sep}`;
  return candidate.startsWith(prefix);
}

function checkPathSyntax(filePath: string): string | undefined {
  if (filePath.length === 0) {
    return "File path cannot be empty";
  }
  if (filePath.includes("..")) {
    return `Path traversal detected: ${filePath}`;
  }

  for (const character of DANGEROUS_PATH_CHARACTERS) {
    if (filePath.includes(character)) {
      return `Dangerous character ${describeCharacter(character)} in path: ${filePath}`;
    }
  }
  // Remaining C0 controls and DEL.
  if (/[\u0001-\u001f\u007f]/u.test(filePath)) {
    return `Control character in path: ${JSON.stringify(filePath)}`;
  }
  if (!isAbsolute(filePath)) {
    return `Only absolute paths are allowed: ${filePath}`;
  }

  return undefined;
}

/**
 * Accepts an absolute path whose canonical form (symlinks resolved through the
 * deepest existing ancestor) lies inside one of the allowed roots: the working
 * directory, the home directory and the system temp directories by default.
 */
export async function validatePath(
  filePath: string,
  options: PathValidationOptions = {}
): Promise<ValidationResult<ValidatedPath>> {
  const syntaxProblem = checkPathSyntax(filePath);
  if (syntaxProblem) {
    return reject(syntaxProblem);
  }

  const canonical = await canonicalize(filePath);
  const roots = await resolveAllowedRoots(options.allowedRoots ?? getDefaultAllowedRoots());
  if (!roots.some((root) => isWithinRoot(canonical, root))) {
    return reject(`Access denied: path is outside allowed directories: ${filePath}`);
  }

  return accept(ValidatedPath.create(filePath, canonical));
}

export function validateCommand(
  command: string,
  options: CommandValidationOptions = {}
): ValidationResult<ValidatedCommand> {
  if (command.trim().length === 0) {
    return reject("Command cannot be empty");
  }
  if (command.length > MAX_COMMAND_LENGTH) {
    return reject(`Command too long: ${String(command.length)} characters`);
  }

  const lowerCommand = command.toLowerCase();
  for (const fragment of DENIED_COMMAND_FRAGMENTS) {
    if (lowerCommand.includes(fragment)) {
      return reject(`Dangerous command detected: ${command}`);
    }
  }
  for (const pattern of options.denyPatterns ?? []) {
    if (pattern.test(command)) {
      return reject(`Command matches deny pattern ${String(pattern)}: ${command}`);
    }
  }

  if (countOccurrences(command, "|") > MAX_COMMAND_PIPES) {
    return reject(`Too many pipes in command: ${command}`);
  }

  const redirects = countOccurrences(command, "<") + countOccurrences(command, ">");
  if (redirects > MAX_COMMAND_REDIRECTS) {
    return reject(`Too many redirects in command: ${command}`);
  }

  return accept(ValidatedCommand.create(command));
}

export function validateGlobPattern(pattern: string): ValidationResult<ValidatedPattern> {
  if (pattern.length === 0) {
    return reject("Pattern cannot be empty");
  }
  if (pattern.includes("..")) {
    return reject(`Path traversal detected in pattern: ${pattern}`);
  }
  if (pattern.includes("\0")) {
    return reject(`Null character in pattern: ${JSON.stringify(pattern)}`);
  }
  if (countOccurrences(pattern, "*") > MAX_PATTERN_WILDCARDS) {
    return reject(`Pattern too complex (too many wildcards): ${pattern}`);
  }

  return accept(ValidatedPattern.create(pattern));
}

export function validateApiKey(apiKey: string): ValidationResult<ValidatedKey> {
  if (apiKey.length === 0) {
    return reject("API key cannot be empty");
  }
  if (!apiKey.startsWith(API_KEY_PREFIX)) {
    return reject(`Invalid API key format (should start with '${API_KEY_PREFIX}')`);
  }
  if (apiKey.length < API_KEY_MIN_LENGTH || apiKey.length > API_KEY_MAX_LENGTH) {
    return reject("API key length invalid");
  }

  return accept(ValidatedKey.create(apiKey));
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Rejects symbolic links at the requested location and regular files over
 * 100 MB. A path that does not exist yet passes.
 */
export async function checkFilePermissions(path: ValidatedPath): Promise<ValidationResult<ValidatedPath>> {
  try {
    const stats = await lstat(path.requested);
    if (stats.isSymbolicLink()) {
      return reject(`Symbolic links are not allowed: ${path.requested}`);
    }
    if (stats.isFile() && stats.size > MAX_PERMITTED_FILE_BYTES) {
      return reject(`File too large: ${String(stats.size)} bytes`);
    }
    return accept(path);
  } catch (error) {
    if (isMissingFileError(error)) {
      return accept(path);
    }
    return reject(
      `Cannot inspect ${path.requested}: ${error instanceof Error ? error.message : "Unknown error"}`
    );
  }
}
