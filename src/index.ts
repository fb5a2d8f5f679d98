export { Agent, AgentState } from "./agent.ts";
export type { AgentDeps } from "./agent.ts";
export { EventBus, Topic, WILDCARD } from "./events/index.ts";
export type { Event, EventHandler, PayloadOf, Subscription } from "./events/index.ts";
export { TaskTracker } from "./task/tracker.ts";
export type { Task } from "./task/types.ts";
export { ModelClient } from "./llm/model-client.ts";
export { createModel } from "./llm/factory.ts";
export { Toolbox, ToolExecutor, ToolCategory, defineTool, createTaskTools } from "./tools/index.ts";
export type { Tool, ToolContext, ToolResult } from "./tools/index.ts";
export { ROLES, resolveRoles, collectRoleTools } from "./roles/index.ts";
export type { Role } from "./roles/index.ts";
export { buildSystemPrompt } from "./identity/prompt.ts";
export { TranscriptLog } from "./logging/transcript-log.ts";
export type { Message } from "./models/message.ts";
export type { ToolArgument, ToolArguments, ToolCall, ToolDefinition } from "./models/tool.ts";
export * from "./infra/index.ts";
