/**
 * OpenAI LLM client using official OpenAI SDK.
 * Works with OpenAI, LiteLLM, and other OpenAI-compatible services.
 */
import OpenAI from "openai";
import type { LanguageModel, Message, RawToolCall } from "./llm-types.ts";
import { LLMError, LLMRateLimitError, LLMTimeoutError, errorToString } from "./errors.ts";
import { isRecord } from "./guards.ts";
import { getLogger } from "./logger.ts";

const logger = getLogger("llm.openai");

export interface OpenAIClientConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Milliseconds. */
  timeout?: number;
  maxRetries?: number;
  headers?: Record<string, string>;
}

/** Convert internal Message[] to OpenAI ChatCompletionMessageParam[]. Exported for testing. */
export function toOpenAIMessages(messages: Message[]): OpenAI.Chat.ChatCompletionMessageParam[] {
  return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
    switch (msg.role) {
      case "tool":
        return {
          role: "tool",
          content: msg.content,
          tool_call_id: msg.toolCallId ?? "",
        };
      case "assistant":
        if (msg.toolCalls?.length) {
          return {
            role: "assistant",
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: {
                name: tc.name,
                arguments: JSON.stringify(tc.arguments),
              },
            })),
          };
        }
        return { role: "assistant", content: msg.content };
      case "system":
        return { role: "system", content: msg.content };
      case "user":
        return { role: "user", content: msg.content };
    }
  });
}

/**
 * Parse the JSON argument string of a function call. A payload that does not
 * decode to an object is kept as `argumentsError`; the call itself survives
 * so the failure can be answered as a tool result. Exported for testing.
 */
export function parseToolArguments(
  name: string,
  raw: string,
): Pick<RawToolCall, "arguments" | "argumentsError"> {
  if (!raw.trim()) return { arguments: {} };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return {
      arguments: {},
      argumentsError: `Malformed arguments for tool call "${name}": ${errorToString(error)}`,
    };
  }
  if (!isRecord(parsed)) {
    return { arguments: {}, argumentsError: `Arguments for tool call "${name}" must be a JSON object` };
  }
  return { arguments: parsed };
}

/** Map SDK failures onto the LLMError hierarchy. */
function toLLMError(error: unknown): LLMError {
  if (error instanceof OpenAI.RateLimitError) {
    return new LLMRateLimitError(error.message, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new LLMTimeoutError(error.message, { cause: error });
  }
  if (error instanceof LLMError) return error;
  return new LLMError(errorToString(error), { cause: error });
}

/**
 * Create a LanguageModel from OpenAI SDK client.
 */
export function createOpenAICompatibleModel(config: OpenAIClientConfig): LanguageModel {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: config.timeout,
    maxRetries: config.maxRetries,
    defaultHeaders: config.headers,
  });

  return {
    provider: "openai",
    modelId: config.model,

    async generate(options) {
      const messages = toOpenAIMessages(options.messages);
      if (options.system) {
        messages.unshift({ role: "system", content: options.system });
      }

      const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
        model: config.model,
        messages,
        temperature: options.temperature,
        max_tokens: options.maxTokens,
        top_p: options.topP,
        stream: false,
      };

      if (options.tools?.length) {
        params.tools = options.tools.map((t) => ({
          type: "function" as const,
          function: {
            name: t.name,
            description: t.description,
            parameters: t.parameters,
          },
        }));
        if (options.toolChoice) {
          params.tool_choice = options.toolChoice;
        }
      }

      const startTime = Date.now();
      logger.info(
        {
          model: config.model,
          messageCount: messages.length,
          toolCount: options.tools?.length ?? 0,
        },
        "llm_request_start",
      );

      let response: OpenAI.Chat.ChatCompletion;
      try {
        response = await client.chat.completions.create(params);
      } catch (error) {
        logger.error(
          { model: config.model, durationMs: Date.now() - startTime, error: errorToString(error) },
          "llm_request_error",
        );
        throw toLLMError(error);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new LLMError("No response from OpenAI model");
      }

      const toolCalls: RawToolCall[] = [];
      for (const tc of choice.message.tool_calls ?? []) {
        if (tc.type !== "function") continue;
        toolCalls.push({
          id: tc.id,
          name: tc.function.name,
          ...parseToolArguments(tc.function.name, tc.function.arguments),
        });
      }

      logger.info(
        {
          model: config.model,
          durationMs: Date.now() - startTime,
          finishReason: choice.finish_reason,
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
          toolCallCount: toolCalls.length,
        },
        "llm_request_done",
      );

      return {
        id: response.id,
        text: choice.message.content || "",
        finishReason: choice.finish_reason,
        toolCalls: toolCalls.length ? toolCalls : undefined,
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0,
        },
      };
    },
  };
}
