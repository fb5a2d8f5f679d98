export {
  AgentRuntimeError,
  ConfigError,
  LLMError,
  LLMRateLimitError,
  LLMTimeoutError,
  TaskError,
  TaskNotFoundError,
  errorToString,
} from "./errors.ts";
export { getLogger } from "./logger.ts";
export { shortId } from "./id.ts";
export { getSettings, setSettings, resetSettings, getActiveProviderConfig, SettingsSchema } from "./config.ts";
export type { Settings, LLMConfig, AgentConfig, ToolsConfig, LLMProviderName } from "./config.ts";
export type { LanguageModel, GenerateOptions, GenerateTextResult, RawToolCall } from "./llm-types.ts";
