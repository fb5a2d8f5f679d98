/**
 * Anthropic LLM client using official Anthropic SDK.
 */
import Anthropic from "@anthropic-ai/sdk";
import type { LanguageModel, Message, RawToolCall } from "./llm-types.ts";
import { LLMError, LLMRateLimitError, LLMTimeoutError, errorToString } from "./errors.ts";
import { isRecord } from "./guards.ts";
import { getLogger } from "./logger.ts";

const logger = getLogger("llm.anthropic");

export interface AnthropicClientConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Milliseconds. */
  timeout?: number;
  maxRetries?: number;
  headers?: Record<string, string>;
}

/**
 * Convert internal Message[] to Anthropic MessageParam[]. Exported for testing.
 *
 * System entries are dropped here; the system prompt travels separately.
 * Consecutive tool results are merged into one user message.
 */
export function toAnthropicMessages(messages: Message[]): Anthropic.MessageParam[] {
  const result: Anthropic.MessageParam[] = [];
  let pendingResults: { role: "user"; content: Anthropic.ToolResultBlockParam[] } | null = null;
  for (const msg of messages) {
    if (msg.role === "system") continue;

    if (msg.role === "tool") {
      const block: Anthropic.ToolResultBlockParam = {
        type: "tool_result",
        tool_use_id: msg.toolCallId ?? "",
        content: msg.content,
      };
      // Results of one batch travel together in a single user turn.
      if (pendingResults) {
        pendingResults.content.push(block);
      } else {
        pendingResults = { role: "user", content: [block] };
        result.push(pendingResults);
      }
      continue;
    }
    pendingResults = null;

    if (msg.role === "assistant" && msg.toolCalls?.length) {
      const content: (Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam)[] = [];
      if (msg.content) {
        content.push({ type: "text", text: msg.content });
      }
      for (const tc of msg.toolCalls) {
        content.push({
          type: "tool_use",
          id: tc.id,
          name: tc.name,
          input: tc.arguments,
        });
      }
      result.push({ role: "assistant", content });
      continue;
    }

    result.push({ role: msg.role, content: msg.content });
  }
  return result;
}

function toLLMError(error: unknown): LLMError {
  if (error instanceof Anthropic.RateLimitError) {
    return new LLMRateLimitError(error.message, { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new LLMTimeoutError(error.message, { cause: error });
  }
  return new LLMError(errorToString(error), { cause: error });
}

/**
 * Create a LanguageModel from Anthropic SDK client.
 */
export function createAnthropicCompatibleModel(config: AnthropicClientConfig): LanguageModel {
  const client = new Anthropic({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeout,
    maxRetries: config.maxRetries,
    defaultHeaders: config.headers,
  });

  return {
    provider: "anthropic",
    modelId: config.model,

    async generate(options) {
      const params: Anthropic.MessageCreateParamsNonStreaming = {
        model: config.model,
        system: options.system,
        messages: toAnthropicMessages(options.messages),
        temperature: options.temperature,
        max_tokens: options.maxTokens || 4096,
        top_p: options.topP,
      };

      if (options.tools?.length) {
        params.tools = options.tools.map((t) => ({
          name: t.name,
          description: t.description,
          input_schema: { ...t.parameters, type: "object" as const },
        }));
      }

      const startTime = Date.now();
      let response: Anthropic.Message;
      try {
        response = await client.messages.create(params);
      } catch (error) {
        logger.error(
          { model: config.model, durationMs: Date.now() - startTime, error: errorToString(error) },
          "llm_request_error",
        );
        throw toLLMError(error);
      }

      const textContent = response.content
        .filter((c): c is Anthropic.TextBlock => c.type === "text")
        .map((c) => c.text)
        .join("");

      const toolCalls = response.content
        .filter((c): c is Anthropic.ToolUseBlock => c.type === "tool_use")
        .map((c): RawToolCall =>
          isRecord(c.input)
            ? { id: c.id, name: c.name, arguments: c.input }
            : {
                id: c.id,
                name: c.name,
                arguments: {},
                argumentsError: `Arguments for tool call "${c.name}" must be an object`,
              },
        );

      logger.info(
        {
          model: config.model,
          durationMs: Date.now() - startTime,
          stopReason: response.stop_reason,
          toolCallCount: toolCalls.length,
        },
        "llm_request_done",
      );

      return {
        id: response.id,
        text: textContent,
        finishReason: response.stop_reason || "stop",
        toolCalls: toolCalls.length ? toolCalls : undefined,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
        },
      };
    },
  };
}
