/**
 * Bus topics and their payloads.
 *
 * Topics are plain strings; no topic needs declaring before use. The map
 * below types the ones the runtime itself publishes or listens to, and any
 * `*_log` topic carries a line of text for the transcript logger.
 */
import type { Task } from "../task/types.ts";

export const Topic = {
  NEW_USER_MESSAGE: "new_user_message",
  NEW_AGENT_MESSAGE: "new_agent_message",

  TASK_CREATED: "task_created",
  TASK_COMPLETED: "task_completed",
  TASK_NOTES_MODIFIED: "task_notes_modified",
  TASK_REQUIREMENTS_MODIFIED: "task_requirements_modified",

  ERROR: "error",
  AGENT_ERROR: "agent_error",

  AGENT_LOG: "agent_log",
  GENERAL_LOG: "general_log",
  TOOLBOX_LOG: "toolbox_log",

  ACTION_NOTICE: "action_notice",
  EXIT_SIGNAL: "exit_signal",
} as const;

export type LogTopic = `${string}_log`;

export interface TopicPayloads {
  new_user_message: string;
  new_agent_message: string;
  task_created: Task;
  task_completed: Task;
  task_notes_modified: Task;
  task_requirements_modified: Task;
  error: string;
  agent_error: string;
  action_notice: string;
  /** Reason for the shutdown request. */
  exit_signal: string;
}

export type KnownTopic = keyof TopicPayloads;

/** Payload type for a topic: declared topics are typed, `*_log` carries text, the rest is opaque. */
export type PayloadOf<T extends string> = T extends KnownTopic
  ? TopicPayloads[T]
  : T extends LogTopic
    ? string
    : unknown;

/** Subscribe to this topic to receive every publish. */
export const WILDCARD = "*";

// ── Event ────────────────────────────────────────────

/** A delivered publish, as recorded in the bus history. */
export interface Event {
  readonly id: string;
  readonly topic: string;
  readonly payload: unknown;
  readonly timestamp: number; // Unix ms
}
