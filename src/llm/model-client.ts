/**
 * ModelClient — the agent's single entry point to a language model.
 *
 * Owns the system prompt and turns one transcript into exactly one Message:
 * either a terminal reply or a non-empty batch of tool calls. A backend
 * failure or an empty reply is an LLMError. Tool arguments pass through
 * unchecked; bad ones are answered at dispatch.
 */
import type { GenerateTextResult, LanguageModel, Message as LLMMessage, RawToolCall } from "../infra/llm-types.ts";
import { LLMError, errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { Role, type Message } from "../models/message.ts";
import type { ToolCall, ToolDefinition } from "../models/tool.ts";

const logger = getLogger("model_client");

export interface ModelClientOptions {
  /** One-time backend initialization, run by startup(). */
  onStartup?: (model: LanguageModel) => Promise<void>;
  temperature?: number;
  maxTokens?: number;
}

export interface GetResponseOptions {
  /** Appended to the system prompt for this call only. */
  context?: string;
}

export class ModelClient {
  private prompt = "";
  private started = false;

  constructor(
    private model: LanguageModel,
    private opts: ModelClientOptions = {},
  ) {}

  get provider(): string {
    return this.model.provider;
  }

  get modelId(): string {
    return this.model.modelId;
  }

  get systemPrompt(): string {
    return this.prompt;
  }

  async startup(systemPrompt: string): Promise<void> {
    this.prompt = systemPrompt;
    if (this.started) return;
    if (this.opts.onStartup) {
      try {
        await this.opts.onStartup(this.model);
      } catch (err) {
        throw toLLMError(err, "Model startup failed");
      }
    }
    this.started = true;
    logger.info({ provider: this.model.provider, model: this.model.modelId }, "model_client_started");
  }

  /** The only supported prompt mutation. */
  appendToSystemPrompt(text: string): string {
    this.prompt = `${this.prompt}\n${text}`;
    return this.prompt;
  }

  async getResponse(
    transcript: readonly Message[],
    tools: readonly ToolDefinition[],
    opts: GetResponseOptions = {},
  ): Promise<Message> {
    const system = opts.context ? `${this.prompt}\n\n${opts.context}` : this.prompt;

    let result: GenerateTextResult;
    try {
      result = await this.model.generate({
        system,
        messages: transcript.map(toLLMMessage),
        tools: tools.length > 0 ? [...tools] : undefined,
        toolChoice: tools.length > 0 ? "auto" : undefined,
        temperature: this.opts.temperature,
        maxTokens: this.opts.maxTokens,
      });
    } catch (err) {
      throw toLLMError(err, "Model request failed");
    }

    const rawCalls = result.toolCalls ?? [];
    if (rawCalls.length > 0) {
      return {
        id: result.id,
        role: Role.ASSISTANT,
        content: result.text || undefined,
        toolCalls: rawCalls.map(toToolCall),
      };
    }

    if (!result.text) {
      throw new LLMError(
        `Model returned neither content nor tool calls (finish reason: ${result.finishReason})`,
      );
    }
    return { id: result.id, role: Role.ASSISTANT, content: result.text };
  }

  /** One-shot completion without tools; "" when the model says nothing. */
  async getTextResponse(prompt: string, systemPrompt: string): Promise<string> {
    try {
      const result = await this.model.generate({
        system: systemPrompt,
        messages: [{ role: "user", content: prompt }],
        temperature: this.opts.temperature,
        maxTokens: this.opts.maxTokens,
      });
      return result.text;
    } catch (err) {
      throw toLLMError(err, "Model request failed");
    }
  }
}

// ── Conversion ──

function toLLMMessage(message: Message): LLMMessage {
  const out: LLMMessage = { role: message.role, content: message.content ?? "" };
  if (message.toolCalls?.length) {
    out.toolCalls = message.toolCalls.map((call) => ({
      id: call.id,
      name: call.name,
      arguments: call.arguments,
    }));
  }
  if (message.toolCallId) {
    out.toolCallId = message.toolCallId;
  }
  return out;
}

function toToolCall(raw: RawToolCall): ToolCall {
  const call: ToolCall = { id: raw.id, name: raw.name, arguments: raw.arguments };
  if (raw.argumentsError) {
    call.argumentsError = raw.argumentsError;
  }
  return call;
}

function toLLMError(err: unknown, prefix: string): LLMError {
  if (err instanceof LLMError) return err;
  return new LLMError(`${prefix}: ${errorToString(err)}`, { cause: err });
}
