import { Command, InvalidArgumentError } from "commander";
import { platform } from "node:os";
import { stdin as input, stdout as output } from "node:process";
import { createInterface, type Interface } from "node:readline/promises";

import type { AgentObserver } from "../agent/observer";
import type { SandboxOptions } from "../types/tool";

import { ConversationOrchestrator, type ConversationResult, type InputReader } from "../agent/loop";
import { loadSettings, SETTINGS_FILE_NAME } from "../config/settings";
import { LlmClient } from "../llm/client";
import { formatPerformanceSummary, PerformanceStats } from "../llm/stats";
import { buildSystemPrompt } from "../prompts/system";
import { allTools } from "../tools";
import { buildConversationSnapshot, getSessionsDirectory, saveConversationSnapshot } from "../tools/session";
import { compileCommandPatterns } from "../tools/shell";
import { getDefaultAllowedRoots } from "../tools/validation";
import { getAgentConfig, type AgentConfig, type ConfigOverrides } from "../types/config";
import { getErrorMessage } from "../utils/errors";
import { initializeLogger, isVerbose, logWarn } from "../utils/logger";

export type CliOptions = {
  apiKey?: string;
  apiUrl?: string;
  maxTurns?: number;
  prompt?: string;
  showConfig?: boolean;
  timeout?: number;
  tools?: boolean;
  verbose?: boolean;
};

const TOOL_RESULT_PREVIEW_CHARS = 200;

export function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/u.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function toConfigOverrides(options: CliOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.apiKey) {
    overrides.apiKey = options.apiKey;
  }
  if (options.apiUrl) {
    overrides.apiBaseUrl = options.apiUrl;
  }
  if (options.maxTurns !== undefined) {
    overrides.maxTurns = options.maxTurns;
  }
  if (options.timeout !== undefined) {
    overrides.timeoutMs = options.timeout * 1000;
  }
  // commander sets `tools` to true unless --no-tools is given; only an explicit opt-out overrides settings.
  if (options.tools === false) {
    overrides.toolsEnabled = false;
  }
  if (options.verbose) {
    overrides.verbose = true;
  }
  return overrides;
}

function preview(text: string): string {
  const singleLine = text.replace(/\s+/gu, " ").trim();
  return singleLine.length > TOOL_RESULT_PREVIEW_CHARS
    ? `${singleLine.slice(0, TOOL_RESULT_PREVIEW_CHARS)}…`
    : singleLine;
}

export function createConsoleObserver(): AgentObserver {
  return {
    onAssistantText: ({ text }) => {
      console.log(`\n${text}\n`);
    },
    onError: ({ message }) => {
      console.error(`\n❌ ${message}\n`);
    },
    onToolCall: ({ input: toolInput, name }) => {
      console.log(`🔧 ${name} ${preview(JSON.stringify(toolInput))}`);
    },
    onToolResult: ({ result }) => {
      if (result.success) {
        console.log(`   ✓ ${preview(result.output)}`);
      } else {
        console.log(`   ✗ ${result.error ?? "failed"}`);
      }
    },
  };
}

function createLineReader(rl: Interface): InputReader {
  let closed = false;
  const closedPromise = new Promise<undefined>((resolveClosed) => {
    rl.once("close", () => {
      closed = true;
      resolveClosed(undefined);
    });
  });

  return async () => {
    if (closed) {
      return undefined;
    }

    const answer = rl.question("you> ").catch((error: unknown) => {
      if (closed) {
        return undefined;
      }
      throw error;
    });
    return Promise.race([answer, closedPromise]);
  };
}

function buildSandbox(config: AgentConfig): SandboxOptions {
  return {
    commandDenyPatterns: compileCommandPatterns(config.commandDenyPatterns),
    commandTimeoutMs: config.commandTimeoutMs,
    workingDirectory: process.cwd(),
  };
}

async function saveSession(orchestrator: ConversationOrchestrator, config: AgentConfig): Promise<void> {
  const snapshot = buildConversationSnapshot(orchestrator.memory.getMessages(), { model: config.model });
  try {
    const filePath = await saveConversationSnapshot(snapshot, getSessionsDirectory(config.settingsDirectory));
    console.log(`Conversation saved: ${filePath}`);
  } catch (error) {
    logWarn(getErrorMessage(error));
  }
}

async function showConfig(): Promise<void> {
  const settings = await loadSettings();
  console.log(`Settings directory: ${settings.settingsDirectory}`);
  console.log(`Settings file: ${settings.settingsDirectory}/${SETTINGS_FILE_NAME}`);
  console.log(`Auto-save: ${String(settings.user.autoSave)}`);
  console.log(`Tools enabled: ${String(settings.user.toolsEnabled)}`);
}

export async function runAgent(options: CliOptions): Promise<number> {
  if (options.showConfig) {
    await showConfig();
    return 0;
  }

  const config = await getAgentConfig(toConfigOverrides(options));
  initializeLogger(config);

  const stats = new PerformanceStats();
  const client = new LlmClient(config, { stats });
  const controller = new AbortController();
  const orchestrator = new ConversationOrchestrator({
    client,
    config,
    observer: createConsoleObserver(),
    sandbox: buildSandbox(config),
    signal: controller.signal,
    systemPrompt: buildSystemPrompt({
      allowedRoots: getDefaultAllowedRoots(),
      availableTools: config.toolsEnabled ? allTools.map((tool) => tool.name) : [],
      currentDirectory: process.cwd(),
      platform: platform(),
    }),
  });

  let result: ConversationResult;
  if (options.prompt !== undefined) {
    const onInterrupt = (): void => controller.abort();
    process.once("SIGINT", onInterrupt);
    try {
      result = await orchestrator.runOnce(options.prompt);
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  } else {
    const rl = createInterface({ input, output });
    rl.on("SIGINT", () => {
      controller.abort();
      rl.close();
    });
    console.log(`\n💬 ferrule (max ${String(config.maxTurns)} turns, /exit to quit)\n`);
    try {
      result = await orchestrator.runConversation(createLineReader(rl));
    } finally {
      rl.close();
    }
  }

  console.log("\n📊 Performance");
  console.log(formatPerformanceSummary(stats.snapshot()));

  if (config.autoSave) {
    await saveSession(orchestrator, config);
  }

  return result.error ? 1 : 0;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = new Command();

  program
    .name("ferrule")
    .description("CLI agent that runs model-requested file and shell tools behind a validation layer")
    .version("0.1.0")
    .option("-k, --api-key <key>", "API key (overrides environment and settings)")
    .option("-m, --max-turns <count>", "Maximum conversation turns (default: 10)", parsePositiveInteger)
    .option("-p, --prompt <text>", "Run a single prompt and exit")
    .option("-u, --api-url <url>", "API base URL")
    .option("-t, --timeout <seconds>", "Per-turn timeout in seconds (default: 120)", parsePositiveInteger)
    .option("--show-config", "Print the settings location and exit")
    .option("--no-tools", "Disable tool use")
    .option("-v, --verbose", "Verbose output")
    .action(async (options: CliOptions) => {
      try {
        process.exit(await runAgent(options));
      } catch (error) {
        console.error("\n❌ Fatal error:", getErrorMessage(error));
        if (error instanceof Error && error.stack && (options.verbose || isVerbose())) {
          console.error(error.stack);
        }
        process.exit(1);
      }
    });

  await program.parseAsync(argv);
}
