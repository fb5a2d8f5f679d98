/**
 * ToolExecutor - resolves, validates and runs tools, always producing text.
 *
 * Failure modes and how they come back:
 *   - unknown tool: failed result + `error` publish
 *   - undecodable, unsupported or schema-rejected arguments: failed result,
 *     tool not invoked
 *   - tool throws or exceeds the timeout: failed result
 * Nothing here throws to the caller.
 */

import type { EventBus } from "../events/bus.ts";
import { Topic } from "../events/types.ts";
import { ToolArgumentsSchema } from "../models/tool.ts";
import type { Tool, ToolContext, ToolResult } from "./types.ts";
import {
  ToolArgumentsError,
  ToolError,
  ToolNotFoundError,
  ToolValidationError,
  ToolTimeoutError,
} from "./errors.ts";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("tools.executor");

/** What the executor needs from a registry. */
export interface ToolLookup {
  find(name: string): Tool | undefined;
  updateCallStats(name: string, duration: number, success: boolean): void;
}

export interface ToolExecutorOptions {
  /** Milliseconds. */
  timeout?: number;
  allowedPaths?: string[];
}

export class ToolExecutor {
  private timeout: number;
  private allowedPaths: string[] | undefined;

  constructor(
    private registry: ToolLookup,
    private bus: EventBus,
    opts: ToolExecutorOptions = {},
  ) {
    this.timeout = opts.timeout ?? 30_000;
    this.allowedPaths = opts.allowedPaths?.length ? opts.allowedPaths : undefined;
  }

  async execute(
    toolName: string,
    args: Record<string, unknown>,
    opts: { toolCallId?: string; argumentsError?: string } = {},
  ): Promise<ToolResult> {
    const startedAt = Date.now();

    logger.info({ toolName, toolCallId: opts.toolCallId }, "tool_execute_start");
    this.bus.publish(Topic.TOOLBOX_LOG, `Calling tool ${toolName} with ${JSON.stringify(args)}`);

    try {
      const tool = this.registry.find(toolName);
      if (!tool) {
        throw new ToolNotFoundError(toolName);
      }

      if (opts.argumentsError) {
        throw new ToolArgumentsError(toolName, opts.argumentsError);
      }
      const values = ToolArgumentsSchema.safeParse(args);
      if (!values.success) {
        throw new ToolValidationError(toolName, values.error.issues);
      }
      const parsed = tool.parameters.safeParse(values.data);
      if (!parsed.success) {
        throw new ToolValidationError(toolName, parsed.error.issues);
      }

      const context: ToolContext = {
        bus: this.bus,
        toolCallId: opts.toolCallId,
        allowedPaths: this.allowedPaths,
      };
      const content = await this.executeWithTimeout(tool, parsed.data, context);

      const completedAt = Date.now();
      const durationMs = completedAt - startedAt;
      this.registry.updateCallStats(toolName, durationMs, true);

      logger.info({ toolName, durationMs }, "tool_execute_done");
      this.bus.publish(Topic.TOOLBOX_LOG, `Tool ${toolName} finished in ${durationMs}ms`);

      return { toolName, success: true, content, startedAt, completedAt, durationMs };
    } catch (error) {
      const completedAt = Date.now();
      const durationMs = completedAt - startedAt;
      const errorMessage = errorToString(error);

      this.registry.updateCallStats(toolName, durationMs, false);

      logger.error({ toolName, durationMs, error: errorMessage }, "tool_execute_error");
      this.bus.publish(Topic.TOOLBOX_LOG, `Tool ${toolName} failed: ${errorMessage}`);
      if (error instanceof ToolNotFoundError) {
        this.bus.publish(Topic.ERROR, errorMessage);
      }

      return {
        toolName,
        success: false,
        content: error instanceof ToolError
          ? `Error: ${errorMessage}`
          : `Error executing tool "${toolName}": ${errorMessage}`,
        error: errorMessage,
        startedAt,
        completedAt,
        durationMs,
      };
    }
  }

  /**
   * Race the tool against the timeout. The tool itself is not cancelled;
   * its eventual result is dropped.
   */
  private async executeWithTimeout(
    tool: Tool,
    params: Record<string, unknown>,
    context: ToolContext,
  ): Promise<string> {
    let timerId: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timerId = setTimeout(() => reject(new ToolTimeoutError(tool.name, this.timeout)), this.timeout);
    });

    try {
      return await Promise.race([tool.execute(params, context), timeoutPromise]);
    } finally {
      clearTimeout(timerId);
    }
  }
}
