import { afterEach, describe, expect, test } from "vitest";
import {
  SettingsSchema,
  getActiveProviderConfig,
  getSettings,
  resetSettings,
  setSettings,
} from "../../src/infra/config.ts";
import { AgentConfigSchema, LLMConfigSchema } from "../../src/infra/config-schema.ts";
import {
  AgentRuntimeError,
  ConfigError,
  LLMError,
  LLMRateLimitError,
  LLMTimeoutError,
  TaskError,
  TaskNotFoundError,
  errorToString,
} from "../../src/infra/errors.ts";
import type { Message } from "../../src/infra/llm-types.ts";
import { parseToolArguments, toOpenAIMessages } from "../../src/infra/openai-client.ts";
import { toAnthropicMessages } from "../../src/infra/anthropic-client.ts";
import { isNonEmptyString, isRecord, isStringArray } from "../../src/infra/guards.ts";
import { shortId } from "../../src/infra/id.ts";

// ── Config ──────────────────────────────────────

describe("Config schemas", () => {
  test("LLMConfigSchema applies defaults", () => {
    const config = LLMConfigSchema.parse({});
    expect(config.provider).toBe("openai");
    expect(config.model).toBe("gpt-4o-mini");
    expect(config.timeout).toBe(120);
    expect(config.maxRetries).toBe(2);
  });

  test("AgentConfigSchema reads string flags", () => {
    expect(AgentConfigSchema.parse({ verbose: "false", silenceActions: "true" })).toMatchObject({
      verbose: false,
      silenceActions: true,
    });
    expect(AgentConfigSchema.parse({}).verbose).toBe(false);
  });

  test("allowedPaths accepts a JSON array string", () => {
    const settings = SettingsSchema.parse({ tools: { allowedPaths: '["/a", "/b"]' } });
    expect(settings.tools.allowedPaths).toEqual(["/a", "/b"]);
  });
});

describe("getSettings / setSettings", () => {
  afterEach(() => {
    resetSettings();
  });

  test("setSettings replaces the cached settings", () => {
    const first = SettingsSchema.parse({ agent: { name: "First" } });
    const second = SettingsSchema.parse({ agent: { name: "Second" } });
    setSettings(first);
    expect(getSettings()).toBe(first);

    resetSettings();
    setSettings(second);
    expect(getSettings().agent.name).toBe("Second");
  });
});

describe("getActiveProviderConfig", () => {
  test("provider-specific model overrides the global one", () => {
    const settings = SettingsSchema.parse({
      llm: {
        provider: "openai",
        model: "global-model",
        openai: { apiKey: "test-secret", model: "openai-model", baseURL: "https://custom.test" },
      },
    });
    expect(getActiveProviderConfig(settings)).toEqual({
      apiKey: "test-secret",
      baseURL: "https://custom.test",
      model: "openai-model",
    });
  });

  test("an explicit provider wins over the configured one", () => {
    const settings = SettingsSchema.parse({
      llm: { provider: "openai", model: "global-model", anthropic: { apiKey: "test-secret" } },
    });
    expect(getActiveProviderConfig(settings, "anthropic")).toEqual({
      apiKey: "test-secret",
      baseURL: undefined,
      model: "global-model",
    });
  });

  test("openai-compatible uses the shared baseURL", () => {
    const settings = SettingsSchema.parse({
      llm: { provider: "openai-compatible", baseURL: "http://localhost:11434/v1" },
    });
    expect(getActiveProviderConfig(settings).baseURL).toBe("http://localhost:11434/v1");
  });
});

// ── Errors ──────────────────────────────────────

describe("Error hierarchy", () => {
  test("classes extend the runtime base and keep their names", () => {
    const cases: Array<[Error, string]> = [
      [new ConfigError("c"), "ConfigError"],
      [new LLMError("l"), "LLMError"],
      [new LLMRateLimitError("r"), "LLMRateLimitError"],
      [new LLMTimeoutError("t"), "LLMTimeoutError"],
      [new TaskError("k"), "TaskError"],
      [new TaskNotFoundError("task_3"), "TaskNotFoundError"],
    ];
    for (const [err, name] of cases) {
      expect(err).toBeInstanceOf(AgentRuntimeError);
      expect(err.name).toBe(name);
    }
    expect(new LLMRateLimitError("r")).toBeInstanceOf(LLMError);
    expect(new TaskNotFoundError("task_3")).toBeInstanceOf(TaskError);
  });

  test("TaskNotFoundError message and cause", () => {
    const err = new TaskNotFoundError("task_3");
    expect(err.message).toBe("Task task_3 not found.");
    expect(err.taskId).toBe("task_3");

    const cause = new Error("root");
    expect(new LLMError("wrapped", { cause }).cause).toBe(cause);
  });

  test("errorToString handles non-errors", () => {
    expect(errorToString(new Error("boom"))).toBe("boom");
    expect(errorToString("plain")).toBe("plain");
    expect(errorToString(42)).toBe("42");
  });
});

// ── Guards / ids ────────────────────────────────

describe("guards", () => {
  test("isRecord excludes arrays and null", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([1])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });

  test("string checks", () => {
    expect(isNonEmptyString(" x ")).toBe(true);
    expect(isNonEmptyString("")).toBe(false);
    expect(isStringArray(["a", "b"])).toBe(true);
    expect(isStringArray(["a", 1])).toBe(false);
  });

  test("shortId is 16 hex chars", () => {
    expect(shortId()).toMatch(/^[0-9a-f]{16}$/);
  });
});

// ── Message conversion ──────────────────────────

const conversation: Message[] = [
  { role: "system", content: "be brief" },
  { role: "user", content: "research X" },
  {
    role: "assistant",
    content: "",
    toolCalls: [
      { id: "call_1", name: "create_task", arguments: { description: "X", requirements: ["a"] } },
      { id: "call_2", name: "current_time", arguments: {} },
    ],
  },
  { role: "tool", content: "Task created with id task_1.", toolCallId: "call_1" },
  { role: "tool", content: "noon", toolCallId: "call_2" },
  { role: "assistant", content: "Done." },
];

describe("toOpenAIMessages", () => {
  test("maps roles, tool calls and tool results", () => {
    expect(toOpenAIMessages(conversation)).toEqual([
      { role: "system", content: "be brief" },
      { role: "user", content: "research X" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "create_task", arguments: '{"description":"X","requirements":["a"]}' },
          },
          { id: "call_2", type: "function", function: { name: "current_time", arguments: "{}" } },
        ],
      },
      { role: "tool", content: "Task created with id task_1.", tool_call_id: "call_1" },
      { role: "tool", content: "noon", tool_call_id: "call_2" },
      { role: "assistant", content: "Done." },
    ]);
  });
});

describe("parseToolArguments", () => {
  test("parses objects and treats blank as empty", () => {
    expect(parseToolArguments("t", '{"a":1}')).toEqual({ arguments: { a: 1 } });
    expect(parseToolArguments("t", "  ")).toEqual({ arguments: {} });
  });

  test("keeps malformed or non-object JSON as an arguments error", () => {
    const malformed = parseToolArguments("t", "{oops");
    expect(malformed.arguments).toEqual({});
    expect(malformed.argumentsError).toMatch(/^Malformed arguments for tool call "t": /);
    expect(parseToolArguments("t", "[1]")).toEqual({
      arguments: {},
      argumentsError: 'Arguments for tool call "t" must be a JSON object',
    });
  });
});

describe("toAnthropicMessages", () => {
  test("drops system entries and merges a batch of tool results", () => {
    expect(toAnthropicMessages(conversation)).toEqual([
      { role: "user", content: "research X" },
      {
        role: "assistant",
        content: [
          { type: "tool_use", id: "call_1", name: "create_task", input: { description: "X", requirements: ["a"] } },
          { type: "tool_use", id: "call_2", name: "current_time", input: {} },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", tool_use_id: "call_1", content: "Task created with id task_1." },
          { type: "tool_result", tool_use_id: "call_2", content: "noon" },
        ],
      },
      { role: "assistant", content: "Done." },
    ]);
  });
});
