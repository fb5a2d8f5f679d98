/**
 * Configuration — Zod-validated settings singleton.
 */
import { join } from "node:path";
import { ConfigError } from "./errors.ts";
import { loadSettings } from "./config-loader.ts";
import type { Settings, LLMProviderName } from "./config-schema.ts";
import { reinitLogger } from "./logger.ts";

export { SettingsSchema } from "./config-schema.ts";
export type { Settings, LLMConfig, AgentConfig, ToolsConfig, LLMProviderName } from "./config-schema.ts";

let _settings: Settings | null = null;

export function getSettings(): Settings {
  if (!_settings) {
    _settings = loadSettings();
    reinitLogger(
      _settings.logLevel,
      join(_settings.dataDir, "logs/runtime.log"),
      _settings.logConsoleEnabled,
      _settings.nodeEnv,
    );
  }
  return _settings;
}

/** Override settings (for testing) */
export function setSettings(s: Settings): void {
  _settings = s;
}

/** Reset settings singleton so next getSettings() reloads from env (for testing) */
export function resetSettings(): void {
  _settings = null;
}

/**
 * Get a provider's configuration merged with defaults.
 * Defaults to the configured provider; `--llm` on the CLI picks another.
 */
export function getActiveProviderConfig(
  settings: Settings,
  provider: LLMProviderName = settings.llm.provider,
): {
  apiKey?: string;
  baseURL?: string;
  model: string;
} {
  const { model: defaultModel, openai, anthropic, baseURL } = settings.llm;

  switch (provider) {
    case "openai":
      return {
        apiKey: openai.apiKey,
        baseURL: openai.baseURL,
        model: openai.model || defaultModel,
      };
    case "anthropic":
      return {
        apiKey: anthropic.apiKey,
        baseURL: anthropic.baseURL,
        model: anthropic.model || defaultModel,
      };
    case "openai-compatible":
      return {
        apiKey: openai.apiKey,
        baseURL,
        model: openai.model || defaultModel,
      };
    default: {
      const unknown: never = provider;
      throw new ConfigError(`Unknown provider: ${String(unknown)}`);
    }
  }
}
