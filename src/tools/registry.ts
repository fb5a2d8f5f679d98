/**
 * Toolbox - name-keyed registry of tools plus call statistics.
 *
 * Assembled once at startup; nothing registers after the agent is built.
 */

import { zodToJsonSchema } from "zod-to-json-schema";
import type { Tool, ToolStats } from "./types.ts";
import { ToolCategory } from "./types.ts";
import type { ToolDefinition } from "../models/tool.ts";

/**
 * Compile a tool's zod parameters into the definition the model sees.
 */
export function toToolDefinition(tool: Tool): ToolDefinition {
  const parameters: Record<string, unknown> = {
    ...zodToJsonSchema(tool.parameters, { $refStrategy: "none" }),
  };
  delete parameters["$schema"];
  return {
    name: tool.name,
    description: tool.description,
    parameters,
  };
}

export class Toolbox {
  private tools = new Map<string, Tool>();
  private callHistory = new Map<
    string,
    { count: number; failures: number; totalDuration: number }
  >();

  constructor(tools: readonly Tool[] = []) {
    this.registerMany(tools);
  }

  register(tool: Tool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  registerMany(tools: readonly Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /** Look a tool up by name; `undefined` means not found. */
  find(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Every registered tool, in registration order. */
  all(): Tool[] {
    return Array.from(this.tools.values());
  }

  listByCategory(category: ToolCategory): Tool[] {
    return this.all().filter((t) => t.category === category);
  }

  toDefinitions(): ToolDefinition[] {
    return this.all().map(toToolDefinition);
  }

  getStats(): ToolStats {
    const tools = this.all();
    const byCategory: Record<ToolCategory, number> = {
      [ToolCategory.SYSTEM]: 0,
      [ToolCategory.FILE]: 0,
      [ToolCategory.NETWORK]: 0,
      [ToolCategory.TASK]: 0,
      [ToolCategory.CUSTOM]: 0,
    };

    for (const tool of tools) {
      byCategory[tool.category]++;
    }

    const callStats: ToolStats["callStats"] = {};
    for (const [name, stats] of this.callHistory.entries()) {
      callStats[name] = {
        count: stats.count,
        failures: stats.failures,
        avgDuration: stats.totalDuration / stats.count,
      };
    }

    return { total: tools.length, byCategory, callStats };
  }

  /**
   * Update call statistics after a tool execution.
   */
  updateCallStats(toolName: string, duration: number, success: boolean): void {
    let stats = this.callHistory.get(toolName);
    if (!stats) {
      stats = { count: 0, failures: 0, totalDuration: 0 };
      this.callHistory.set(toolName, stats);
    }
    stats.count++;
    if (!success) {
      stats.failures++;
    }
    stats.totalDuration += duration;
  }
}
