/**
 * TaskTracker — the agent's in-memory to-do list.
 *
 * The tracker is the only writer of its tasks. Every mutation is all or
 * nothing, publishes a lifecycle event carrying a copy of the task, and
 * reports failure as `false` plus an `error` publish instead of throwing.
 */
import type { EventBus } from "../events/bus.ts";
import { Topic } from "../events/types.ts";
import { TaskNotFoundError } from "../infra/errors.ts";
import { isNonEmptyString, isStringArray } from "../infra/guards.ts";
import { getLogger } from "../infra/logger.ts";
import { cloneTask, type Task } from "./types.ts";

const logger = getLogger("task_tracker");

export interface TaskTrackerOptions {
  /** Suppress the human-readable `action_notice` publishes. */
  silenceActions?: boolean;
}

export class TaskTracker {
  private tasks: Task[] = [];
  /** Ids handed out so far; ids derive from this, never from tasks.length. */
  private issued = 0;
  private silenceActions: boolean;

  constructor(
    private bus: EventBus,
    opts: TaskTrackerOptions = {},
  ) {
    this.silenceActions = opts.silenceActions ?? false;
  }

  /** Id the next successful createTask() will assign. */
  nextTaskId(): string {
    return `task_${this.issued + 1}`;
  }

  // ── Mutations ──

  createTask(description: string, requirements: readonly string[], completed = false): boolean {
    if (!isNonEmptyString(description)) {
      return this.fail("Error creating task: No description provided.");
    }
    if (!isStringArray(requirements) || requirements.length === 0) {
      return this.fail("Error creating task: Requirements must be a non-empty list of strings.");
    }

    this.issued++;
    const task: Task = {
      id: `task_${this.issued}`,
      description,
      requirements: [...requirements],
      completed,
      notes: "",
    };
    this.tasks.push(task);

    logger.info({ taskId: task.id, requirements: task.requirements.length }, "task_created");
    this.notice(`Created task: ${task.description}`);
    this.bus.publish(Topic.TASK_CREATED, cloneTask(task));
    return true;
  }

  completeTask(taskId: string): boolean {
    const task = this.find(taskId);
    if (!task) return this.notFound(taskId);

    task.completed = true;
    logger.info({ taskId }, "task_completed");
    this.notice(`Completed task: ${task.description}`);
    this.bus.publish(Topic.TASK_COMPLETED, cloneTask(task));
    return true;
  }

  /** Replace the notes wholesale. */
  modifyTaskNotes(taskId: string, notes: string): boolean {
    const task = this.find(taskId);
    if (!task) return this.notFound(taskId);

    task.notes = notes;
    logger.info({ taskId }, "task_notes_modified");
    this.notice(`Modified notes for task: ${task.description}`);
    this.bus.publish(Topic.TASK_NOTES_MODIFIED, cloneTask(task));
    return true;
  }

  /** Replace the requirements wholesale; no merge with the previous list. */
  modifyTaskRequirements(taskId: string, requirements: readonly string[]): boolean {
    if (!isStringArray(requirements) || requirements.length === 0) {
      return this.fail("Error modifying task: Requirements must be a non-empty list of strings.");
    }
    const task = this.find(taskId);
    if (!task) return this.notFound(taskId);

    task.requirements = [...requirements];
    logger.info({ taskId, requirements: requirements.length }, "task_requirements_modified");
    this.notice(`Modified requirements for task: ${task.description}`);
    this.bus.publish(Topic.TASK_REQUIREMENTS_MODIFIED, cloneTask(task));
    return true;
  }

  // ── Queries (all return copies) ──

  getTask(taskId: string): Task | undefined {
    const task = this.find(taskId);
    return task ? cloneTask(task) : undefined;
  }

  getTasks(): Task[] {
    return this.tasks.map(cloneTask);
  }

  getIncompleteTasks(): Task[] {
    return this.tasks.filter((t) => !t.completed).map(cloneTask);
  }

  getCompletedTasks(): Task[] {
    return this.tasks.filter((t) => t.completed).map(cloneTask);
  }

  hasIncompleteTasks(): boolean {
    return this.tasks.some((t) => !t.completed);
  }

  /**
   * Render tasks as delimited blocks for the model's context:
   *
   *   ---
   *   Task ID: task_1
   *   Description: ...
   *   Requirements:
   *   - first
   *   Notes:
   *   (none)
   *   Completed: false
   *   ---
   */
  describeTasks(tasks: readonly Task[]): string {
    return tasks
      .map((task) =>
        [
          "---",
          `Task ID: ${task.id}`,
          `Description: ${task.description}`,
          "Requirements:",
          ...task.requirements.map((req) => `- ${req}`),
          "Notes:",
          task.notes || "(none)",
          `Completed: ${task.completed}`,
          "---",
        ].join("\n"),
      )
      .join("\n");
  }

  getIncompleteTasksDescribed(): string {
    return this.describeTasks(this.getIncompleteTasks());
  }

  // ── Internal ──

  private find(taskId: string): Task | undefined {
    return this.tasks.find((t) => t.id === taskId);
  }

  private notFound(taskId: string): false {
    return this.fail(new TaskNotFoundError(taskId).message);
  }

  private fail(message: string): false {
    logger.warn({ error: message }, "task_operation_failed");
    this.bus.publish(Topic.ERROR, message);
    return false;
  }

  private notice(text: string): void {
    if (!this.silenceActions) {
      this.bus.publish(Topic.ACTION_NOTICE, text);
    }
  }
}
