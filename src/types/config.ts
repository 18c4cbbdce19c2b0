import type { LoadedSettings } from "../config/settings";

import { DEFAULT_MODEL, getEnv, type Env } from "../config/env";
import { loadSettings } from "../config/settings";
import { DEFAULT_RETRY_POLICY } from "../llm/retry";
import { validateApiKey } from "../tools/validation";
import { ConfigurationError } from "../utils/errors";
import { logWarn } from "../utils/logger";

export const DEFAULT_API_BASE_URL = "https://api.anthropic.com";

export type AgentConfig = {
  apiBaseUrl: string;
  apiKey: string;
  autoSave: boolean;
  commandDenyPatterns: string[];
  commandTimeoutMs: number;
  maxTokens: number;
  maxTurns: number;
  model: string;
  requestTimeoutMs: number;
  settingsDirectory: string;
  timeoutMs: number;
  toolsEnabled: boolean;
  verbose: boolean;
};

export type ConfigOverrides = {
  apiBaseUrl?: string;
  apiKey?: string;
  maxTurns?: number;
  timeoutMs?: number;
  toolsEnabled?: boolean;
  verbose?: boolean;
};

function resolveApiKey(overrides: ConfigOverrides, env: Env, settings: LoadedSettings): string {
  const candidates = [
    overrides.apiKey,
    env.ANTHROPIC_API_KEY,
    env.ANTHROPIC_AUTH_TOKEN,
    settings.local.authToken,
    settings.user.apiKey,
  ];
  const apiKey = candidates.find((candidate) => candidate !== undefined && candidate.trim().length > 0);
  if (!apiKey) {
    throw new ConfigurationError(
      `API key not found. Set ANTHROPIC_API_KEY or configure apiKey in ${settings.settingsDirectory}/settings.json`
    );
  }

  return apiKey.trim();
}

function resolveApiBaseUrl(overrides: ConfigOverrides, env: Env, settings: LoadedSettings): string {
  const fromSettings = settings.user.apiBaseUrl?.trim();
  return overrides.apiBaseUrl ?? (fromSettings || undefined) ?? env.ANTHROPIC_BASE_URL ?? DEFAULT_API_BASE_URL;
}

export function resolveAgentConfig(
  env: Env,
  settings: LoadedSettings,
  overrides: ConfigOverrides = {}
): AgentConfig {
  const apiKey = resolveApiKey(overrides, env, settings);
  const keyCheck = validateApiKey(apiKey);
  if (!keyCheck.ok) {
    logWarn(`API key looks malformed (${keyCheck.reason}); sending it anyway`);
  }

  const timeoutMs = overrides.timeoutMs ?? env.API_TIMEOUT_MS;
  if (DEFAULT_RETRY_POLICY.maxElapsedMs > timeoutMs) {
    logWarn(
      `Turn timeout ${String(timeoutMs)}ms is shorter than the ${String(DEFAULT_RETRY_POLICY.maxElapsedMs)}ms retry budget; slow retries will be cut off`
    );
  }

  return {
    apiBaseUrl: resolveApiBaseUrl(overrides, env, settings),
    apiKey,
    autoSave: env.AGENT_AUTO_SAVE ?? settings.user.autoSave,
    commandDenyPatterns: env.AGENT_COMMAND_DENY_PATTERNS,
    commandTimeoutMs: env.AGENT_COMMAND_TIMEOUT_MS,
    maxTokens: env.AGENT_MAX_TOKENS,
    maxTurns: overrides.maxTurns ?? env.AGENT_MAX_TURNS,
    model: env.AGENT_MODEL ?? settings.user.model ?? DEFAULT_MODEL,
    requestTimeoutMs: env.AGENT_REQUEST_TIMEOUT_MS,
    settingsDirectory: settings.settingsDirectory,
    timeoutMs,
    toolsEnabled: overrides.toolsEnabled ?? settings.user.toolsEnabled,
    verbose: overrides.verbose ?? env.AGENT_VERBOSE,
  };
}

export async function getAgentConfig(overrides: ConfigOverrides = {}): Promise<AgentConfig> {
  const settings = await loadSettings();
  return resolveAgentConfig(getEnv(), settings, overrides);
}
