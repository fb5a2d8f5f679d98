/**
 * Tests for config-loader.ts
 */
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  deepMerge,
  interpolateEnvVars,
  loadFromEnv,
  loadSettings,
} from "../../src/infra/config-loader.ts";
import { ConfigError } from "../../src/infra/errors.ts";

describe("interpolateEnvVars", () => {
  const env = { HOME_DIR: "/home/test", EMPTY: "" };

  test("replaces plain references", () => {
    expect(interpolateEnvVars("${HOME_DIR}/data", env)).toBe("/home/test/data");
  });

  test(":- falls back when unset or empty", () => {
    expect(interpolateEnvVars("${MISSING:-fallback}", env)).toBe("fallback");
    expect(interpolateEnvVars("${EMPTY:-fallback}", env)).toBe("fallback");
    expect(interpolateEnvVars("${HOME_DIR:-fallback}", env)).toBe("/home/test");
  });

  test(":+ substitutes only when set", () => {
    expect(interpolateEnvVars("${HOME_DIR:+yes}", env)).toBe("yes");
    expect(interpolateEnvVars("x${MISSING:+yes}", env)).toBe("x");
  });

  test(":? throws when unset", () => {
    expect(() => interpolateEnvVars("${MISSING:?set it}", env)).toThrow(ConfigError);
    expect(() => interpolateEnvVars("${MISSING:?set it}", env)).toThrow(
      "Environment variable MISSING is required but not set: set it",
    );
  });

  test("empty results become undefined and structures are walked", () => {
    expect(interpolateEnvVars({ a: "${MISSING}", b: ["${HOME_DIR}"], c: 3 }, env)).toEqual({
      a: undefined,
      b: ["/home/test"],
      c: 3,
    });
  });
});

describe("deepMerge", () => {
  test("merges nested records and ignores undefined", () => {
    expect(
      deepMerge(
        { llm: { model: "a", timeout: 10 }, keep: true },
        { llm: { model: "b", timeout: undefined }, extra: [1] },
      ),
    ).toEqual({ llm: { model: "b", timeout: 10 }, keep: true, extra: [1] });
  });
});

describe("loadFromEnv", () => {
  test("applies schema defaults", () => {
    const settings = loadFromEnv({});
    expect(settings.llm.provider).toBe("openai");
    expect(settings.llm.model).toBe("gpt-4o-mini");
    expect(settings.llm.timeout).toBe(120);
    expect(settings.agent.name).toBe("Simmy");
    expect(settings.agent.roles).toEqual(["researcher"]);
    expect(settings.agent.maxToolRounds).toBe(10);
    expect(settings.agent.silenceActions).toBe(false);
    expect(settings.tools.timeout).toBe(30);
    expect(settings.tools.allowedPaths).toEqual([]);
    expect(settings.logDirectory).toBe("simple-agent-logs");
  });

  test("reads overrides from env vars", () => {
    const settings = loadFromEnv({
      LLM_PROVIDER: "anthropic",
      ANTHROPIC_API_KEY: "test-secret",
      AGENT_NAME: "Robin",
      AGENT_ROLES: "researcher, Researcher",
      AGENT_MAX_TOOL_ROUNDS: "4",
      AGENT_VERBOSE: "true",
      TOOLS_ALLOWED_PATHS: "/tmp/a,/tmp/b",
      LOG_DIRECTORY: "logs-here",
    });
    expect(settings.llm.provider).toBe("anthropic");
    expect(settings.llm.anthropic.apiKey).toBe("test-secret");
    expect(settings.agent.name).toBe("Robin");
    expect(settings.agent.roles).toEqual(["researcher", "Researcher"]);
    expect(settings.agent.maxToolRounds).toBe(4);
    expect(settings.agent.verbose).toBe(true);
    expect(settings.tools.allowedPaths).toEqual(["/tmp/a", "/tmp/b"]);
    expect(settings.logDirectory).toBe("logs-here");
  });

  test("LLM_API_KEY fills in both providers", () => {
    const settings = loadFromEnv({ LLM_API_KEY: "test-secret" });
    expect(settings.llm.openai.apiKey).toBe("test-secret");
    expect(settings.llm.anthropic.apiKey).toBe("test-secret");
  });

  test("maps ollama onto openai-compatible", () => {
    expect(loadFromEnv({ LLM_PROVIDER: "ollama" }).llm.provider).toBe("openai-compatible");
  });

  test("invalid values raise ConfigError", () => {
    expect(() => loadFromEnv({ LLM_PROVIDER: "mystery" })).toThrow(ConfigError);
    expect(() => loadFromEnv({ AGENT_MAX_TOOL_ROUNDS: "0" })).toThrow(/agent\.maxToolRounds/);
  });
});

describe("loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agent-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("falls back to env when there is no config file", () => {
    const settings = loadSettings({ cwd: dir, env: { AGENT_NAME: "Env" } });
    expect(settings.agent.name).toBe("Env");
  });

  test("reads YAML, lifts system and providers, interpolates env", () => {
    writeFileSync(
      join(dir, "config.yaml"),
      [
        "llm:",
        "  provider: anthropic",
        "  model: base-model",
        "  providers:",
        "    anthropic:",
        "      apiKey: ${ANTHROPIC_KEY}",
        "agent:",
        "  name: Yaml",
        "  maxToolRounds: ${ROUNDS:-7}",
        "  verbose: ${VERBOSE:-false}",
        "system:",
        "  logLevel: warn",
        "  logDirectory: yaml-logs",
      ].join("\n"),
    );

    const settings = loadSettings({ cwd: dir, env: { ANTHROPIC_KEY: "test-secret" } });

    expect(settings.llm.provider).toBe("anthropic");
    expect(settings.llm.anthropic.apiKey).toBe("test-secret");
    expect(settings.agent.name).toBe("Yaml");
    expect(settings.agent.maxToolRounds).toBe(7);
    expect(settings.agent.verbose).toBe(false);
    expect(settings.logLevel).toBe("warn");
    expect(settings.logDirectory).toBe("yaml-logs");
  });

  test("config.local.yaml overrides config.yaml and env overrides both", () => {
    writeFileSync(join(dir, "config.yaml"), "agent:\n  name: Base\n  maxToolRounds: 3\n");
    writeFileSync(join(dir, "config.local.yaml"), "agent:\n  name: Local\n");

    const fromFiles = loadSettings({ cwd: dir, env: {} });
    expect(fromFiles.agent.name).toBe("Local");
    expect(fromFiles.agent.maxToolRounds).toBe(3);

    const withEnv = loadSettings({ cwd: dir, env: { AGENT_NAME: "Env" } });
    expect(withEnv.agent.name).toBe("Env");
  });

  test("AGENT_CONFIG points at a specific file", () => {
    const custom = join(dir, "custom.json");
    writeFileSync(custom, JSON.stringify({ agent: { name: "Json" } }));

    expect(loadSettings({ cwd: dir, env: { AGENT_CONFIG: custom } }).agent.name).toBe("Json");
    expect(() =>
      loadSettings({ cwd: dir, env: { AGENT_CONFIG: join(dir, "missing.yaml") } }),
    ).toThrow(ConfigError);
  });

  test("two base config files are ambiguous", () => {
    writeFileSync(join(dir, "config.yaml"), "agent: {}\n");
    writeFileSync(join(dir, "config.yml"), "agent: {}\n");
    expect(() => loadSettings({ cwd: dir, env: {} })).toThrow(/Multiple base config files/);
  });

  test("malformed YAML is a ConfigError", () => {
    writeFileSync(join(dir, "config.yaml"), "agent: [unclosed\n");
    expect(() => loadSettings({ cwd: dir, env: {} })).toThrow(/Failed to load config file/);
  });
});
