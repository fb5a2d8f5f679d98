/**
 * Configuration schemas and types.
 * Separated to avoid circular dependencies between config.ts and config-loader.ts.
 */
import { z } from "zod";

export const LLM_PROVIDERS = ["openai", "anthropic", "openai-compatible"] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

// Provider-specific configuration
export const ProviderConfigSchema = z.object({
  apiKey: z.string().optional(),
  baseURL: z.string().optional(),
  model: z.string().optional(),
});

export const LLMConfigSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default("openai"),

  // Default model (fallback if provider-specific not set)
  model: z.string().default("gpt-4o-mini"),

  openai: ProviderConfigSchema.default({}),
  anthropic: ProviderConfigSchema.default({}),

  // For openai-compatible providers (Ollama, LM Studio, etc.)
  baseURL: z.string().optional(),

  timeout: z.coerce.number().int().positive().default(120), // seconds
  maxRetries: z.coerce.number().int().min(0).default(2),
});

/** "false", "0", "no" and "" are false; YAML interpolation yields strings. */
function coerceFlag(val: unknown): unknown {
  if (typeof val === "string") {
    return !["", "0", "false", "no", "off"].includes(val.trim().toLowerCase());
  }
  return val;
}

const flag = z.preprocess(coerceFlag, z.boolean().default(false));

export const AgentConfigSchema = z.object({
  name: z.string().min(1).default("Simmy"),
  roles: z.array(z.string()).default(["researcher"]),
  maxToolRounds: z.coerce.number().int().positive().default(10),
  silenceActions: flag,
  verbose: flag,
});

/**
 * Preprocess stringified arrays from env var interpolation.
 * YAML ${VAR:-[]} produces string "[]" instead of an actual array.
 */
function coerceStringArray(val: unknown): unknown {
  if (typeof val === "string") {
    const trimmed = val.trim();
    if (trimmed === "[]" || trimmed === "") return [];
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      return trimmed.split(",").map((s) => s.trim()).filter(Boolean);
    }
  }
  return val;
}

export const ToolsConfigSchema = z.object({
  timeout: z.coerce.number().int().positive().default(30), // seconds
  allowedPaths: z.preprocess(coerceStringArray, z.array(z.string()).default([])),
});

export const SettingsSchema = z.object({
  llm: LLMConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  logLevel: z.string().default("info"),
  dataDir: z.string().default("data"),
  logDirectory: z.string().default("simple-agent-logs"),
  logConsoleEnabled: flag,
  nodeEnv: z.string().optional(),
});

export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
