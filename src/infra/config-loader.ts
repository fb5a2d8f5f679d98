/**
 * ConfigLoader — Load configuration from YAML files with env var support.
 *
 * Features:
 * - Load from config.yaml (base) + config.local.yaml (override)
 * - Support ${ENV_VAR} interpolation in strings
 * - Environment variables override all file configs
 * - Fallback to env-only mode if no config file found
 * - Custom config path via AGENT_CONFIG env var
 */
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorToString } from "./errors.ts";
import { isRecord } from "./guards.ts";
import { getLogger } from "./logger.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";

const logger = getLogger("config_loader");

type Env = Record<string, string | undefined>;

/**
 * Interpolate ${VAR_NAME} placeholders with environment variables.
 * Supports bash-style default value syntax:
 * - ${VAR:-default}  Use default if VAR is unset or empty
 * - ${VAR:?error}    Error if VAR is unset or empty
 * - ${VAR:+alternate} Use alternate if VAR is set
 *
 * A string that interpolates to "" becomes undefined so schema defaults apply.
 */
export function interpolateEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") {
    const replaced = value.replace(/\$\{([^}]+)\}/g, (_match, content: string) => {
      const operatorMatch = /^([^:]+)(:-|:\?|:\+)(.*)$/.exec(content);
      if (!operatorMatch) {
        return env[content] ?? "";
      }

      const [, varName = "", operator, fallback = ""] = operatorMatch;
      const envValue = env[varName] ?? "";

      switch (operator) {
        case ":-":
          return envValue === "" ? fallback : envValue;
        case ":?":
          if (envValue === "") {
            throw new ConfigError(
              `Environment variable ${varName} is required but not set: ${fallback || "missing value"}`,
            );
          }
          return envValue;
        case ":+":
          return envValue === "" ? "" : fallback;
        default:
          return envValue;
      }
    });
    return replaced === "" ? undefined : replaced;
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env));
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = interpolateEnvVars(val, env);
    }
    return result;
  }
  return value;
}

/**
 * Load and parse a config file (JSON or YAML).
 */
function loadConfigFile(path: string, env: Env): Record<string, unknown> {
  let parsed: unknown;
  try {
    const content = readFileSync(path, "utf-8");
    const isYaml = path.endsWith(".yaml") || path.endsWith(".yml");
    parsed = isYaml ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to load config file ${path}: ${errorToString(err)}`);
  }

  if (parsed == null) return {};
  const interpolated = interpolateEnvVars(parsed, env);
  if (!isRecord(interpolated)) {
    throw new ConfigError(`Config file ${path} must contain a mapping at the top level`);
  }
  return interpolated;
}

/**
 * Deep merge two objects, with source overriding target.
 * Undefined values in source never clobber target values.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Find and load config files with layered merging.
 * Priority: config.local.y(a)ml overrides config.y(a)ml.
 */
function findAndMergeConfigs(cwd: string, env: Env): Record<string, unknown> | null {
  const customPath = env["AGENT_CONFIG"];
  if (customPath) {
    if (!existsSync(customPath)) {
      throw new ConfigError(`AGENT_CONFIG points to a missing file: ${customPath}`);
    }
    logger.info({ path: customPath }, "loading_config_from_custom_path");
    return loadConfigFile(customPath, env);
  }

  const pick = (names: string[], kind: string): string | null => {
    const found = names.map((n) => join(cwd, n)).filter((p) => existsSync(p));
    if (found.length > 1) {
      throw new ConfigError(
        `Multiple ${kind} config files found: ${found.join(", ")}. Please keep only one.`,
      );
    }
    return found[0] ?? null;
  };

  const basePath = pick(["config.yaml", "config.yml"], "base");
  const localPath = pick(["config.local.yaml", "config.local.yml"], "local");

  if (!basePath && !localPath) return null;

  let merged: Record<string, unknown> = {};
  if (basePath) {
    logger.info({ path: basePath }, "loading_base_config");
    merged = loadConfigFile(basePath, env);
  }
  if (localPath) {
    logger.info({ path: localPath }, "loading_local_config_override");
    merged = deepMerge(merged, loadConfigFile(localPath, env));
  }
  return merged;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "true" || value === "1";
}

function envList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(",").map((s) => s.trim()).filter(Boolean);
}

/**
 * Environment variable overrides, shaped like the settings tree.
 *
 *   LLM_PROVIDER, LLM_MODEL, LLM_BASE_URL, LLM_TIMEOUT, LLM_MAX_RETRIES
 *   OPENAI_API_KEY, OPENAI_BASE_URL, OPENAI_MODEL
 *   ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL, ANTHROPIC_MODEL
 *   LLM_API_KEY - falls back to provider-specific key
 *   AGENT_NAME, AGENT_ROLES, AGENT_MAX_TOOL_ROUNDS, AGENT_SILENCE_ACTIONS, AGENT_VERBOSE
 *   TOOLS_TIMEOUT, TOOLS_ALLOWED_PATHS
 *   AGENT_LOG_LEVEL, AGENT_DATA_DIR, LOG_DIRECTORY, AGENT_LOG_CONSOLE_ENABLED, NODE_ENV
 */
function envOverrides(env: Env): Record<string, unknown> {
  return {
    llm: {
      provider: env["LLM_PROVIDER"],
      model: env["LLM_MODEL"],
      openai: {
        apiKey: env["OPENAI_API_KEY"] || env["LLM_API_KEY"],
        baseURL: env["OPENAI_BASE_URL"],
        model: env["OPENAI_MODEL"],
      },
      anthropic: {
        apiKey: env["ANTHROPIC_API_KEY"] || env["LLM_API_KEY"],
        baseURL: env["ANTHROPIC_BASE_URL"],
        model: env["ANTHROPIC_MODEL"],
      },
      baseURL: env["LLM_BASE_URL"],
      timeout: env["LLM_TIMEOUT"],
      maxRetries: env["LLM_MAX_RETRIES"],
    },
    agent: {
      name: env["AGENT_NAME"],
      roles: envList(env["AGENT_ROLES"]),
      maxToolRounds: env["AGENT_MAX_TOOL_ROUNDS"],
      silenceActions: envFlag(env["AGENT_SILENCE_ACTIONS"]),
      verbose: envFlag(env["AGENT_VERBOSE"]),
    },
    tools: {
      timeout: env["TOOLS_TIMEOUT"],
      allowedPaths: env["TOOLS_ALLOWED_PATHS"],
    },
    logLevel: env["AGENT_LOG_LEVEL"],
    dataDir: env["AGENT_DATA_DIR"],
    logDirectory: env["LOG_DIRECTORY"],
    logConsoleEnabled: envFlag(env["AGENT_LOG_CONSOLE_ENABLED"]),
    nodeEnv: env["NODE_ENV"],
  };
}

/**
 * Reshape a config file into the settings tree.
 *
 * Files keep runtime knobs under `system:` and provider blocks under
 * `llm.providers`; both are lifted to where SettingsSchema expects them.
 */
function fileToSettingsInput(config: Record<string, unknown>): Record<string, unknown> {
  const { system, llm, ...rest } = config;
  let result: Record<string, unknown> = { ...rest };

  if (isRecord(llm)) {
    const { providers, ...llmRest } = llm;
    const lifted: Record<string, unknown> = { ...llmRest };
    if (isRecord(providers)) {
      for (const name of ["openai", "anthropic"]) {
        const block = providers[name];
        if (isRecord(block)) {
          lifted[name] = isRecord(lifted[name]) ? deepMerge(block, lifted[name]) : block;
        }
      }
    }
    result["llm"] = lifted;
  }

  if (isRecord(system)) {
    result = deepMerge(result, system);
  }

  return result;
}

/** Map provider aliases onto the provider the adapters understand. */
function normalizeProvider(input: Record<string, unknown>): Record<string, unknown> {
  const llm = input["llm"];
  if (!isRecord(llm)) return input;
  const provider = llm["provider"];
  if (provider === "ollama" || provider === "lmstudio") {
    return { ...input, llm: { ...llm, provider: "openai-compatible" } };
  }
  return input;
}

function parseSettings(input: Record<string, unknown>): Settings {
  const parsed = SettingsSchema.safeParse(normalizeProvider(input));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load from env vars only (fallback when no config file).
 */
export function loadFromEnv(env: Env = process.env): Settings {
  return parseSettings(deepMerge({}, envOverrides(env)));
}

/**
 * Load settings from config file or env vars.
 *
 * Priority:
 * 1. Environment variables (highest)
 * 2. config.local.yml/yaml (overrides base config)
 * 3. config.yml/yaml (base config)
 * 4. Schema defaults
 */
export function loadSettings(opts: { cwd?: string; env?: Env } = {}): Settings {
  const env = opts.env ?? process.env;
  const merged = findAndMergeConfigs(opts.cwd ?? process.cwd(), env);

  if (!merged) {
    logger.info("loading_config_from_env");
    return loadFromEnv(env);
  }

  return parseSettings(deepMerge(fileToSettingsInput(merged), envOverrides(env)));
}
