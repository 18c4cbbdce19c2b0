export interface SystemPromptContext {
  allowedRoots?: string[];
  availableTools?: string[];
  currentDirectory?: string;
  platform?: string;
}

export const BASE_SYSTEM_PROMPT = `You are a careful command-line assistant with access to local tools.

TOOL RULES:
1. File tools take absolute paths only. Relative paths and ".." are rejected.
2. Paths must stay inside the allowed directories listed below.
3. Shell commands run through the platform shell. Destructive commands, more than two pipes and more than two redirects are rejected.
4. A rejected call is reported back to you as an error; adjust the request instead of repeating it.
5. list_files takes a glob pattern relative to its base path, or an absolute glob.
6. Prefer small, reversible changes and say what you changed.`;

export function buildSystemPrompt(context: SystemPromptContext = {}): string {
  const sections = [BASE_SYSTEM_PROMPT];

  const environment: string[] = [];
  if (context.currentDirectory) {
    environment.push(`Working directory: ${context.currentDirectory}`);
  }
  if (context.platform) {
    environment.push(`Platform: ${context.platform}`);
  }
  if (context.allowedRoots && context.allowedRoots.length > 0) {
    environment.push(`Allowed directories: ${context.allowedRoots.join(", ")}`);
  }
  if (context.availableTools && context.availableTools.length > 0) {
    environment.push(`Available tools: ${context.availableTools.join(", ")}`);
  }

  if (environment.length > 0) {
    sections.push(`ENVIRONMENT:\n${environment.join("\n")}`);
  }

  return sections.join("\n\n");
}
