/**
 * Build a LanguageModel for the configured (or overridden) provider.
 */
import { getActiveProviderConfig, type LLMProviderName, type Settings } from "../infra/config.ts";
import { ConfigError } from "../infra/errors.ts";
import type { LanguageModel } from "../infra/llm-types.ts";
import { getLogger } from "../infra/logger.ts";
import { createAnthropicCompatibleModel } from "../infra/anthropic-client.ts";
import { createOpenAICompatibleModel } from "../infra/openai-client.ts";

const logger = getLogger("llm.factory");

export function createModel(
  settings: Settings,
  provider: LLMProviderName = settings.llm.provider,
): LanguageModel {
  const config = getActiveProviderConfig(settings, provider);
  const timeout = settings.llm.timeout * 1000;
  const maxRetries = settings.llm.maxRetries;

  let model: LanguageModel;
  switch (provider) {
    case "anthropic": {
      if (!config.apiKey) {
        throw new ConfigError(
          "ANTHROPIC_API_KEY is required. Set it in .env:\n" +
            "  ANTHROPIC_API_KEY=your-key-here",
        );
      }
      model = createAnthropicCompatibleModel({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        model: config.model,
        timeout,
        maxRetries,
      });
      break;
    }

    case "openai": {
      if (!config.apiKey) {
        throw new ConfigError(
          "OPENAI_API_KEY is required. Set it in .env:\n" +
            "  OPENAI_API_KEY=your-key-here",
        );
      }
      model = createOpenAICompatibleModel({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        model: config.model,
        timeout,
        maxRetries,
      });
      break;
    }

    case "openai-compatible": {
      if (!config.baseURL) {
        throw new ConfigError(
          "LLM_BASE_URL is required for openai-compatible provider. Set it in .env:\n" +
            "  LLM_BASE_URL=http://localhost:11434/v1  # For Ollama\n" +
            "  LLM_BASE_URL=http://localhost:1234/v1   # For LM Studio",
        );
      }
      model = createOpenAICompatibleModel({
        apiKey: config.apiKey || "dummy", // local servers usually ignore the key
        baseURL: config.baseURL,
        model: config.model,
        timeout,
        maxRetries,
      });
      break;
    }

    default: {
      const unknown: never = provider;
      throw new ConfigError(`Unsupported LLM provider: ${String(unknown)}`);
    }
  }

  logger.info({ provider, model: config.model, baseURL: config.baseURL }, "llm_initialized");
  return model;
}
