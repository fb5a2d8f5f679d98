/** Task — one entry on the agent's to-do list. */
export interface Task {
  /** `task_<n>`, assigned in creation order and never reused. */
  readonly id: string;
  description: string;
  requirements: string[];
  completed: boolean;
  notes: string;
}

/** Detached copy, so callers and subscribers never alias tracker state. */
export function cloneTask(task: Task): Task {
  return { ...task, requirements: [...task.requirements] };
}
