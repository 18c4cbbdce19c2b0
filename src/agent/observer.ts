import type { ToolResult } from "../types/tool";

export interface AgentTextEvent {
  text: string;
  turn: number;
}

export interface AgentErrorEvent {
  message: string;
  turn: number;
}

export interface AgentTurnStartEvent {
  maxTurns: number;
  turn: number;
}

export interface AgentToolCallEvent {
  id: string;
  input: Record<string, unknown>;
  name: string;
  turn: number;
}

export interface AgentToolResultEvent {
  id: string;
  name: string;
  result: ToolResult;
  turn: number;
}

export interface AgentObserver {
  onAssistantText?: (event: AgentTextEvent) => void;
  onError?: (event: AgentErrorEvent) => void;
  onToolCall?: (event: AgentToolCallEvent) => void;
  onToolResult?: (event: AgentToolResultEvent) => void;
  onTurnStart?: (event: AgentTurnStartEvent) => void;
}
