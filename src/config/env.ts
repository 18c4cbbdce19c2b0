import { z } from "zod";

import { ConfigurationError } from "../utils/errors";

const ENV_BOOLEAN_TRUE_VALUES = new Set(["1", "on", "true", "yes"]);
const ENV_BOOLEAN_FALSE_VALUES = new Set(["", "0", "false", "no", "off"]);
const ENV_BOOLEAN_ALLOWED_VALUES = "true, false, 1, 0, yes, no, on, off, or empty string";

export const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";

function toEnvBoolean(rawValue: string): boolean | undefined {
  const normalized = rawValue.trim().toLowerCase();
  if (ENV_BOOLEAN_TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (ENV_BOOLEAN_FALSE_VALUES.has(normalized)) {
    return false;
  }

  return undefined;
}

function invalidBooleanMessage(rawValue: string): string {
  return `Invalid boolean value "${rawValue}". Expected one of: ${ENV_BOOLEAN_ALLOWED_VALUES}.`;
}

function createEnvBooleanSchema(defaultValue: boolean): z.ZodType<boolean> {
  return z.string().optional().transform((rawValue, context) => {
    if (rawValue === undefined) {
      return defaultValue;
    }

    const parsed = toEnvBoolean(rawValue);
    if (parsed === undefined) {
      context.addIssue({ code: "custom", message: invalidBooleanMessage(rawValue) });
      return z.NEVER;
    }
    return parsed;
  });
}

// Unset means "defer to the settings file".
const optionalEnvBooleanSchema = z.string().optional().transform((rawValue, context) => {
  if (rawValue === undefined) {
    return undefined;
  }

  const parsed = toEnvBoolean(rawValue);
  if (parsed === undefined) {
    context.addIssue({ code: "custom", message: invalidBooleanMessage(rawValue) });
    return z.NEVER;
  }
  return parsed;
});

const optionalNonEmptyString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const commandPatternListSchema = z.string().default("").transform((value) =>
  value
    .split(";;")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0)
);

export const envSchema = z.object({
  AGENT_AUTO_SAVE: optionalEnvBooleanSchema,
  AGENT_COMMAND_DENY_PATTERNS: commandPatternListSchema,
  AGENT_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  AGENT_MAX_TOKENS: z.coerce.number().int().positive().default(8192),
  AGENT_MAX_TURNS: z.coerce.number().int().positive().default(10),
  AGENT_MODEL: optionalNonEmptyString,
  AGENT_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  AGENT_VERBOSE: createEnvBooleanSchema(false),
  ANTHROPIC_API_KEY: optionalNonEmptyString,
  ANTHROPIC_AUTH_TOKEN: optionalNonEmptyString,
  ANTHROPIC_BASE_URL: optionalNonEmptyString,
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnvironment(input: Record<string, string | undefined>) {
  return envSchema.safeParse(input);
}

let cachedEnv: Env | null = null;

export function getEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  const parsed = parseEnvironment(process.env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid environment configuration:\n${JSON.stringify(z.treeifyError(parsed.error), null, 2)}`,
      parsed.error
    );
  }

  cachedEnv = parsed.data;
  return cachedEnv;
}
