import { Project, Subtask, Task } from '../../types';

/**
 * True while the task is an unacknowledged assignment for the user.
 */
export function isNewFor(task: Task, userId: string): boolean {
  return task.newForUserIds.includes(userId);
}

export function isUnassigned(task: Task): boolean {
  return task.assigneeIds.length === 0;
}

export function isTaskOverdue(task: Task, now: number): boolean {
  return task.dueDate !== undefined && task.dueDate < now && task.status !== 'done';
}

export function isSubtaskOverdue(subtask: Subtask, now: number): boolean {
  return subtask.dueDate !== undefined && subtask.dueDate < now && !subtask.isDone;
}

/**
 * Same local calendar day as `now`.
 */
export function isDueToday(task: Task, now: number): boolean {
  if (task.dueDate === undefined) return false;
  return new Date(task.dueDate).toDateString() === new Date(now).toDateString();
}

/**
 * Incomplete subtasks first, then completed ones. Insertion order is kept
 * within each group.
 */
export function sortSubtasksForDisplay(subtasks: readonly Subtask[]): Subtask[] {
  return [
    ...subtasks.filter(s => !s.isDone),
    ...subtasks.filter(s => s.isDone)
  ];
}

export function subtaskProgress(task: Task): { completed: number; total: number } {
  return {
    completed: task.subtasks.filter(s => s.isDone).length,
    total: task.subtasks.length
  };
}

export function newTasksFor(project: Project, userId: string): Task[] {
  return project.tasks.filter(t => isNewFor(t, userId));
}

export function pendingTasks(project: Project): Task[] {
  return project.tasks.filter(t => t.status === 'pending');
}

export function completedTasks(project: Project): Task[] {
  return project.tasks.filter(t => t.status === 'done');
}

/**
 * Locate a subtask anywhere in the project together with its parent task.
 */
export function findSubtask(project: Project, subtaskId: string): { task: Task; subtask: Subtask } | null {
  for (const task of project.tasks) {
    const subtask = task.subtasks.find(s => s.id === subtaskId);
    if (subtask) {
      return { task, subtask };
    }
  }
  return null;
}
