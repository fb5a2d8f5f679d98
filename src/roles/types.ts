import type { Tool } from "../tools/types.ts";

/**
 * A role the assistant can take on: identity text for the system prompt
 * plus the tools that come with it.
 */
export interface Role {
  name: string;
  identity: string;
  tools: Tool[];
}
