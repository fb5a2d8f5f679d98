/** Tool-call models shared by the model client, the executor and the agent. */
import { z } from "zod";

/**
 * A single argument value a model may pass to a tool.
 *
 * Strings, numbers, booleans, lists of strings and nested objects are the
 * shapes tool schemas declare; anything else is rejected before dispatch.
 */
export type ToolArgument =
  | string
  | number
  | boolean
  | string[]
  | { [key: string]: ToolArgument };

export type ToolArguments = Record<string, ToolArgument>;

export const ToolArgumentSchema: z.ZodType<ToolArgument> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.array(z.string()),
    z.record(z.string(), ToolArgumentSchema),
  ]),
);

export const ToolArgumentsSchema = z.record(z.string(), ToolArgumentSchema);

/**
 * A model-issued request to run one tool. Arguments are kept as the model
 * sent them; the ToolExecutor checks them against ToolArgumentsSchema and the
 * tool's own schema, and answers a mismatch with a failed tool result.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Set when the backend could not decode the argument payload. */
  argumentsError?: string;
}

/** What the model is told about a tool. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}
