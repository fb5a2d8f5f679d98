/** Message model for the conversation transcript. */
import type { ToolCall } from "./tool.ts";

export const Role = {
  SYSTEM: "system",
  USER: "user",
  ASSISTANT: "assistant",
  TOOL: "tool",
} as const;

export type Role = (typeof Role)[keyof typeof Role];

export interface Message {
  /** Backend-assigned identifier, when the backend supplies one. */
  id?: string;
  /** Absent on pure tool-call requests. */
  content?: string;
  role: Role;
  /** Present only on assistant entries that request tools. */
  toolCalls?: ToolCall[];
  /** Present only on tool-result entries; links back to the originating call. */
  toolCallId?: string;
}

export function userMessage(content: string): Message {
  return { role: Role.USER, content };
}

export function toolResultMessage(toolCallId: string, content: string): Message {
  return { role: Role.TOOL, content, toolCallId };
}

export function hasToolCalls(message: Message): message is Message & { toolCalls: ToolCall[] } {
  return (message.toolCalls?.length ?? 0) > 0;
}

/**
 * Check that every tool-result entry answers a tool call emitted earlier
 * in the same transcript. Returns the offending index, or -1.
 */
export function findUncorrelatedToolResult(transcript: readonly Message[]): number {
  const seen = new Set<string>();
  for (const [index, message] of transcript.entries()) {
    for (const call of message.toolCalls ?? []) {
      seen.add(call.id);
    }
    if (message.role === Role.TOOL) {
      if (!message.toolCallId || !seen.has(message.toolCallId)) {
        return index;
      }
    }
  }
  return -1;
}
