/**
 * Prompt builder — compile the assistant's name and roles into a system prompt.
 */
import type { Role } from "../roles/types.ts";

// ── Section builders ──

export function buildIdentitySection(name: string, roles: readonly Role[]): string[] {
  const lines = [`You are ${name}, a helpful assistant.`];
  if (roles.length > 0) {
    lines.push("", "## Roles", "");
    for (const role of roles) {
      lines.push(`- ${role.name}: ${role.identity}`);
    }
  }
  return lines;
}

export function buildTaskSection(): string[] {
  return [
    "## Tasks",
    "",
    "For any request that takes more than one step, create a task with `create_task`",
    "listing its requirements. Record findings with `modify_task_notes`, adjust the",
    "plan with `modify_task_requirements`, and call `complete_task` once every",
    "requirement is met. Your open tasks are listed at the end of this prompt.",
  ];
}

export function buildResponseSection(): string[] {
  return [
    "## Responding",
    "",
    "Call tools when you need them. When you are done, answer the user directly in",
    "plain text; that answer ends your turn.",
  ];
}

// ── Main builder ──

export function buildSystemPrompt(name: string, roles: readonly Role[]): string {
  return [
    ...buildIdentitySection(name, roles),
    "",
    ...buildTaskSection(),
    "",
    ...buildResponseSection(),
  ].join("\n");
}
