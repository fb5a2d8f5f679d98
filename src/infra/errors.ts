/**
 * Error hierarchy for the agent runtime.
 *
 * AgentRuntimeError (base)
 * ├── ConfigError
 * ├── LLMError
 * │   ├── LLMRateLimitError
 * │   └── LLMTimeoutError
 * └── TaskError
 *     └── TaskNotFoundError
 *
 * Tool failures have their own hierarchy in tools/errors.ts; they never
 * leave the ToolExecutor as exceptions.
 */

export class AgentRuntimeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentRuntimeError";
  }
}

export class ConfigError extends AgentRuntimeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── LLM ──────────────────────────────────────────

export class LLMError extends AgentRuntimeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LLMError";
  }
}

export class LLMRateLimitError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LLMRateLimitError";
  }
}

export class LLMTimeoutError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LLMTimeoutError";
  }
}

// ── Task ─────────────────────────────────────────

export class TaskError extends AgentRuntimeError {
  constructor(message: string) {
    super(message);
    this.name = "TaskError";
  }
}

export class TaskNotFoundError extends TaskError {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found.`);
    this.name = "TaskNotFoundError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * Error objects have non-enumerable `message` and `stack` properties,
 * so `JSON.stringify(err)` returns `"{}"`. pino serializes log fields
 * via JSON before sending them to the transport worker thread, which
 * means `logger.warn({ error: err })` loses all error information.
 *
 * Use this helper everywhere an error is passed to logger fields:
 *   `logger.warn({ error: errorToString(err) }, "something_failed")`
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
