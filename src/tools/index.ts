import type { LlmToolDefinition } from "../llm/types";
import type { Tool } from "../types/tool";

import { fsTools } from "./fs";
import { searchTools } from "./search";
import { shellTools } from "./shell";

export const allTools: Tool[] = [...fsTools, ...shellTools, ...searchTools];

export function getToolByName(name: string): Tool | undefined {
  return allTools.find((tool) => tool.name === name);
}

// Fixed contract sent with every tool-enabled request.
export function getToolManifest(): LlmToolDefinition[] {
  return allTools.map((tool) => tool.definition);
}
