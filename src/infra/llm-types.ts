/**
 * LLM types - backend boundary for language model adapters.
 *
 * Adapters speak these types; the ModelClient converts between them and
 * the transcript's Message model.
 */

import type { ToolDefinition } from "../models/tool.ts";

/**
 * Tool call exactly as a backend returned it. Arguments are checked against
 * the tool's schema at dispatch, not here.
 */
export interface RawToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Why the argument payload could not be decoded; `arguments` is then `{}`. */
  argumentsError?: string;
}

/**
 * Message in a conversation with an LLM.
 */
export interface Message {
  role: "user" | "assistant" | "system" | "tool";
  content: string;
  toolCallId?: string;
  toolCalls?: RawToolCall[];
}

/**
 * Result from text generation.
 */
export interface GenerateTextResult {
  /** Backend-assigned response id. */
  id?: string;
  text: string;
  finishReason: string;
  toolCalls?: RawToolCall[];
  usage: {
    promptTokens: number;
    completionTokens: number;
  };
}

export interface GenerateOptions {
  system?: string;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  tools?: ToolDefinition[];
  toolChoice?: "auto" | "none";
}

/**
 * Language model interface that providers must implement.
 */
export interface LanguageModel {
  provider: string;
  modelId: string;

  /**
   * Generate text from a prompt.
   */
  generate(options: GenerateOptions): Promise<GenerateTextResult>;
}
