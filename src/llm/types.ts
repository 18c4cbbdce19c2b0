export type LlmRole = "assistant" | "system" | "user";

export interface TextBlock {
  text: string;
  type: "text";
}

export interface ToolUseBlock {
  id: string;
  input: Record<string, unknown>;
  name: string;
  type: "tool_use";
}

export interface ToolResultBlock {
  content: string;
  is_error?: boolean;
  tool_use_id: string;
  type: "tool_result";
}

export type ContentBlock = TextBlock | ToolResultBlock | ToolUseBlock;

export type ResponseBlock = TextBlock | ToolUseBlock;

export interface LlmMessage {
  content: ContentBlock[];
  role: LlmRole;
}

export interface LlmToolDefinition {
  description: string;
  input_schema: {
    properties: Record<string, { description: string; type: "string" }>;
    required: string[];
    type: "object";
  };
  name: string;
}

export interface LlmRequest {
  messages: LlmMessage[];
  signal?: AbortSignal;
  tools?: LlmToolDefinition[];
}

export interface LlmUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LlmResponse {
  content: ResponseBlock[];
  id?: string;
  stopReason?: string;
  usage?: LlmUsage;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
