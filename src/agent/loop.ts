import type { LlmClient } from "../llm/client";
import type { LlmResponse, ResponseBlock, ToolResultBlock, ToolUseBlock } from "../llm/types";
import type { AgentConfig } from "../types/config";
import type { SandboxOptions, ToolCall, ToolExecutionContext, ToolResult } from "../types/tool";
import type { AgentObserver } from "./observer";

import { getToolManifest } from "../tools";
import { TURN_ABORTING_FAILURES } from "../types/tool";
import { ToolExecutionError, TurnTimeoutError } from "../utils/errors";
import { log, logError, logStep, logWarn } from "../utils/logger";
import { executeToolCall } from "./executor";
import { Memory } from "./memory";
import { ConversationStateMachine } from "./state";

export type ChatClient = Pick<LlmClient, "chat">;

export type ToolRunner = (toolCall: ToolCall, context: ToolExecutionContext) => Promise<ToolResult>;

/**
 * One pending tool invocation together with the assistant content that
 * carries its tool_use block.
 */
export interface ToolTask {
  assistantContent: ResponseBlock[];
  toolInput: Record<string, unknown>;
  toolName: string;
  toolUseId: string;
}

export interface ConversationOptions {
  client: ChatClient;
  config: Pick<AgentConfig, "maxTurns" | "timeoutMs" | "toolsEnabled">;
  memory?: Memory;
  observer?: AgentObserver;
  runTool?: ToolRunner;
  sandbox?: SandboxOptions;
  signal?: AbortSignal;
  systemPrompt?: string;
}

export type TurnOutcome = { error: Error; ok: false; turn: number } | { ok: true; turn: number };

export interface ConversationResult {
  error?: Error;
  turns: number;
}

export type InputReader = () => Promise<string | undefined>;

export const EXIT_COMMAND = "/exit";

/**
 * Splits a model response into tool tasks. Text before a tool_use travels with
 * it; text after the last tool_use is attached to the last task.
 */
export function splitResponse(content: ResponseBlock[]): ToolTask[] {
  const tasks: ToolTask[] = [];
  let pendingText: ResponseBlock[] = [];

  for (const block of content) {
    if (block.type === "text") {
      pendingText.push(block);
      continue;
    }

    tasks.push({
      assistantContent: [...pendingText, block],
      toolInput: block.input,
      toolName: block.name,
      toolUseId: block.id,
    });
    pendingText = [];
  }

  const lastTask = tasks[tasks.length - 1];
  if (lastTask && pendingText.length > 0) {
    lastTask.assistantContent.push(...pendingText);
  }

  return tasks;
}

export function buildToolResultBlock(toolUse: Pick<ToolUseBlock, "id">, result: ToolResult): ToolResultBlock {
  if (result.success) {
    return { content: result.output, tool_use_id: toolUse.id, type: "tool_result" };
  }

  return {
    content: `Error: ${result.error ?? "Tool failed"}`,
    is_error: true,
    tool_use_id: toolUse.id,
    type: "tool_result",
  };
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class ConversationOrchestrator {
  readonly memory: Memory;
  readonly state = new ConversationStateMachine();
  private readonly options: ConversationOptions;
  private readonly runTool: ToolRunner;
  private turns = 0;

  constructor(options: ConversationOptions) {
    this.options = options;
    this.memory = options.memory ?? new Memory();
    this.runTool = options.runTool ?? executeToolCall;

    if (options.systemPrompt && this.memory.length === 0) {
      this.memory.addText("system", options.systemPrompt);
    }
  }

  /**
   * Handles one user message to completion: the model reply and every tool
   * call it leads to, nested calls before their siblings. Failures are
   * reported in the outcome, never thrown.
   */
  async runTurn(userText: string): Promise<TurnOutcome> {
    this.turns += 1;
    const turn = this.turns;
    this.options.observer?.onTurnStart?.({ maxTurns: this.options.config.maxTurns, turn });
    logStep(turn, "Sending user message");

    this.state.transition("awaiting_model_response");
    this.memory.addText("user", userText);

    try {
      await this.resolveTurn(turn);
      this.state.transition("awaiting_input");
      return { ok: true, turn };
    } catch (error) {
      const failure = toError(error);
      logError(`Turn ${String(turn)} failed: ${failure.message}`, failure);
      this.options.observer?.onError?.({ message: failure.message, turn });
      if (this.state.state !== "idle") {
        this.state.transition("idle");
      }
      this.state.transition("awaiting_input");
      return { error: failure, ok: false, turn };
    } finally {
      const dropped = this.memory.trim();
      if (dropped > 0) {
        log(`Trimmed ${String(dropped)} messages from history`);
      }
    }
  }

  async runOnce(prompt: string): Promise<ConversationResult> {
    const outcome = await this.runTurn(prompt);
    this.state.transition("terminated");
    return outcome.ok ? { turns: this.turns } : { error: outcome.error, turns: this.turns };
  }

  /**
   * Reads user messages until end of input, `/exit` or the turn limit. A
   * failure on the very first turn ends the run; later failures are reported
   * and the session goes on.
   */
  async runConversation(readInput: InputReader): Promise<ConversationResult> {
    while (this.turns < this.options.config.maxTurns) {
      const line = await readInput();
      if (line === undefined || line.trim() === EXIT_COMMAND) {
        break;
      }
      if (line.trim().length === 0) {
        continue;
      }

      const outcome = await this.runTurn(line);
      if (!outcome.ok && outcome.turn === 1) {
        this.state.transition("terminated");
        return { error: outcome.error, turns: this.turns };
      }
    }

    if (this.turns >= this.options.config.maxTurns) {
      logWarn(`Reached maximum number of turns (${String(this.options.config.maxTurns)})`);
    }
    this.state.transition("terminated");
    return { turns: this.turns };
  }

  private async resolveTurn(turn: number): Promise<void> {
    const stack: ToolTask[] = [];
    this.acceptResponse(await this.callModel(), stack, turn);

    while (true) {
      const task = stack.pop();
      if (!task) {
        return;
      }

      this.memory.addMessage("assistant", task.assistantContent);
      this.options.observer?.onToolCall?.({
        id: task.toolUseId,
        input: task.toolInput,
        name: task.toolName,
        turn,
      });

      const result = await this.runTool(
        { input: task.toolInput, name: task.toolName },
        this.buildToolContext()
      );
      this.options.observer?.onToolResult?.({ id: task.toolUseId, name: task.toolName, result, turn });
      this.memory.addMessage("user", [buildToolResultBlock({ id: task.toolUseId }, result)]);

      if (!result.success && result.failure && TURN_ABORTING_FAILURES.has(result.failure)) {
        throw new ToolExecutionError(result.error ?? `Tool ${task.toolName} failed`, result.failure);
      }

      this.state.transition("awaiting_model_response");
      this.acceptResponse(await this.callModel(), stack, turn);
    }
  }

  private acceptResponse(response: LlmResponse, stack: ToolTask[], turn: number): void {
    for (const block of response.content) {
      if (block.type === "text" && block.text.length > 0) {
        this.options.observer?.onAssistantText?.({ text: block.text, turn });
      }
    }

    const tasks = splitResponse(response.content);
    if (tasks.length === 0) {
      if (response.content.length > 0) {
        this.memory.addMessage("assistant", response.content);
      }
    } else {
      // Reverse so the first tool_use is popped first.
      for (let index = tasks.length - 1; index >= 0; index -= 1) {
        const task = tasks[index];
        if (task) {
          stack.push(task);
        }
      }
    }

    this.state.transition(stack.length > 0 ? "dispatching_tools" : "idle");
  }

  private async callModel(): Promise<LlmResponse> {
    const timeoutMs = this.options.config.timeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new TurnTimeoutError(timeoutMs));
    }, timeoutMs);
    const outer = this.options.signal;
    const onOuterAbort = (): void => controller.abort(outer?.reason);
    outer?.addEventListener("abort", onOuterAbort, { once: true });

    try {
      return await this.options.client.chat({
        messages: this.memory.getMessages(),
        signal: controller.signal,
        ...(this.options.config.toolsEnabled ? { tools: getToolManifest() } : {}),
      });
    } catch (error) {
      if (timedOut) {
        throw error instanceof TurnTimeoutError ? error : new TurnTimeoutError(timeoutMs, error);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    }
  }

  private buildToolContext(): ToolExecutionContext {
    return {
      ...(this.options.signal ? { abortSignal: this.options.signal } : {}),
      ...(this.options.sandbox ? { sandbox: this.options.sandbox } : {}),
    };
  }
}
