/**
 * Tools system - core types and utilities.
 */

import type { z } from "zod";
import path from "node:path";
import type { EventBus } from "../events/bus.ts";

// ── ToolCategory ─────────────────────────────────────

export enum ToolCategory {
  SYSTEM = "system",
  FILE = "file",
  NETWORK = "network",
  TASK = "task",
  CUSTOM = "custom",
}

// ── Tool ───────────────────────────────────────────

/**
 * Tool interface - all tools must implement this.
 *
 * `parameters` is the single source of truth for the argument shape: it is
 * advertised to the model as JSON Schema and checked before `execute` runs.
 * `execute` always resolves to text the model can read; a thrown error is
 * turned into text by the ToolExecutor.
 */
export interface Tool<S extends z.AnyZodObject = z.AnyZodObject> {
  name: string;
  description: string;
  category: ToolCategory;
  parameters: S;
  execute(params: z.infer<S>, context: ToolContext): Promise<string>;
}

/** Identity helper that infers `execute`'s params from the schema. */
export function defineTool<S extends z.AnyZodObject>(tool: Tool<S>): Tool<S> {
  return tool;
}

// ── ToolResult ───────────────────────────────────

/**
 * Outcome of one dispatch, as recorded by the ToolExecutor.
 * `content` is what goes into the transcript, success or not.
 */
export interface ToolResult {
  toolName: string;
  success: boolean;
  content: string;
  error?: string;
  startedAt: number;
  completedAt: number;
  durationMs: number;
}

// ── ToolContext ─────────────────────────────────

/**
 * Context passed to tool execution.
 */
export interface ToolContext {
  bus: EventBus;
  toolCallId?: string;
  allowedPaths?: string[];
}

// ── ToolStats ─────────────────────────────────

export interface ToolStats {
  total: number;
  byCategory: Record<ToolCategory, number>;
  callStats: Record<string, { count: number; failures: number; avgDuration: number }>;
}

// ── Path Security ─────────────────────────────

/**
 * Normalize a file path, resolving relative references.
 * If baseDir is provided, relative paths are resolved against it.
 */
export function normalizePath(pathToNormalize: string, baseDir?: string): string {
  if (baseDir && !path.isAbsolute(pathToNormalize)) {
    return path.resolve(baseDir, pathToNormalize);
  }
  return path.resolve(pathToNormalize);
}

/**
 * Check if a path is allowed based on a whitelist.
 * Subdirectories are automatically included.
 */
export function isPathAllowed(pathToCheck: string, allowedPaths: string[]): boolean {
  const normalized = normalizePath(pathToCheck);

  return allowedPaths.some((allowedPath) => {
    const normalizedAllowed = normalizePath(allowedPath);
    return (
      normalized === normalizedAllowed ||
      normalized.startsWith(normalizedAllowed + path.sep)
    );
  });
}
