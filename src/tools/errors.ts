/**
 * Tool error types.
 *
 * These never escape the ToolExecutor; their messages become the text of a
 * failed tool result.
 */
import type { z } from "zod";

// ── ToolError ───────────────────────────────────

export class ToolError extends Error {
  constructor(
    public toolName: string,
    message: string,
    public override cause?: unknown,
  ) {
    super(message);
    this.name = "ToolError";
  }
}

// ── ToolNotFoundError ───────────────────────────

export class ToolNotFoundError extends ToolError {
  constructor(toolName: string) {
    super(toolName, `Tool "${toolName}" not found`);
    this.name = "ToolNotFoundError";
  }
}

// ── ToolValidationError ──────────────────────

/** Render zod issues as `path: message` pairs. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export class ToolValidationError extends ToolError {
  constructor(toolName: string, issues: readonly z.ZodIssue[]) {
    super(toolName, `Invalid arguments for tool "${toolName}": ${formatIssues(issues)}`, issues);
    this.name = "ToolValidationError";
  }
}

// ── ToolArgumentsError ──────────────────────

/** The backend could not decode the call's argument payload. */
export class ToolArgumentsError extends ToolError {
  constructor(toolName: string, message: string) {
    super(toolName, message);
    this.name = "ToolArgumentsError";
  }
}

// ── ToolTimeoutError ──────────────────────────

export class ToolTimeoutError extends ToolError {
  constructor(toolName: string, timeout: number) {
    super(toolName, `Tool "${toolName}" timed out after ${timeout}ms`);
    this.name = "ToolTimeoutError";
  }
}

// ── ToolPermissionError ────────────────────────

export class ToolPermissionError extends ToolError {
  constructor(toolName: string, message: string) {
    super(toolName, `Permission denied: ${message}`);
    this.name = "ToolPermissionError";
  }
}
