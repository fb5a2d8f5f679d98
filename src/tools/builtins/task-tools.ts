/**
 * Task tools — the TaskTracker's mutations, callable by the model.
 *
 * Each wrapper re-checks its required arguments before touching the tracker
 * and answers with a short sentence the model can act on.
 */

import { z } from "zod";
import type { TaskTracker } from "../../task/tracker.ts";
import { defineTool, ToolCategory, type Tool } from "../types.ts";

const taskIdParam = z.string().describe("The id of the task, e.g. task_1.");

export function createTaskTools(tracker: TaskTracker): Tool[] {
  const create_task = defineTool({
    name: "create_task",
    description: "Use this tool to create a new task.",
    category: ToolCategory.TASK,
    parameters: z.object({
      description: z.string().describe("A description of the overall task."),
      requirements: z.array(z.string()).min(1).describe("A list of requirements for the task."),
      completed: z
        .boolean()
        .optional()
        .describe("Whether the task is currently completed. Defaults to false."),
    }),
    async execute({ description, requirements, completed }) {
      if (!description.trim()) {
        return "Error creating task: No description provided.";
      }
      if (requirements.length === 0) {
        return "Error creating task: No requirements provided.";
      }

      const id = tracker.nextTaskId();
      if (!tracker.createTask(description, requirements, completed ?? false)) {
        return "Error creating task.";
      }
      return `Task created with id ${id}.`;
    },
  });

  const complete_task = defineTool({
    name: "complete_task",
    description: "Use this to mark a task complete.",
    category: ToolCategory.TASK,
    parameters: z.object({
      task_id: taskIdParam,
    }),
    async execute({ task_id }) {
      if (!tracker.completeTask(task_id)) {
        return `Error completing task with id ${task_id}.`;
      }
      return `Task with id ${task_id} marked as complete.`;
    },
  });

  const modify_task_notes = defineTool({
    name: "modify_task_notes",
    description: "Use this to modify the notes for a task. The notes are replaced, not appended to.",
    category: ToolCategory.TASK,
    parameters: z.object({
      task_id: taskIdParam,
      notes: z.string().describe("The new notes for the task."),
    }),
    async execute({ task_id, notes }) {
      if (!tracker.modifyTaskNotes(task_id, notes)) {
        return `Error modifying notes for task with id ${task_id}.`;
      }
      return `Notes for task with id ${task_id} modified.`;
    },
  });

  const modify_task_requirements = defineTool({
    name: "modify_task_requirements",
    description:
      "Use this to modify the requirements for a task. The new list replaces the old one.",
    category: ToolCategory.TASK,
    parameters: z.object({
      task_id: taskIdParam,
      requirements: z.array(z.string()).min(1).describe("The new requirements for the task."),
    }),
    async execute({ task_id, requirements }) {
      if (requirements.length === 0) {
        return "Error modifying task: No requirements provided.";
      }
      if (!tracker.modifyTaskRequirements(task_id, requirements)) {
        return `Error modifying requirements for task with id ${task_id}.`;
      }
      return `Requirements for task with id ${task_id} modified.`;
    },
  });

  return [create_task, complete_task, modify_task_notes, modify_task_requirements];
}
