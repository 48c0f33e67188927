import type { Task, TaskId, TaskSnapshot, TaskStatus } from '../types.js';

export interface TaskSummary {
  id: TaskId;
  title: string;
  status: TaskStatus;
  parentId?: TaskId;
  childCount: number;
  updatedAt: string;
}

export interface TaskView extends Omit<Task, 'updatedAt'> {
  updatedAt: string;
}

export function toTaskSummary(task: Readonly<Task>): TaskSummary {
  return {
    id: task.id,
    title: task.title,
    status: task.status,
    parentId: task.parentId,
    childCount: task.childIds.length,
    updatedAt: new Date(task.updatedAt).toISOString()
  };
}

export function toTaskView(task: Readonly<Task>): TaskView {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    parentId: task.parentId,
    childIds: [...task.childIds],
    requirements: [...task.requirements],
    notes: [...task.notes],
    updatedAt: new Date(task.updatedAt).toISOString()
  };
}

export function indexTasks(snapshot: TaskSnapshot): Map<TaskId, Readonly<Task>> {
  return new Map(snapshot.tasks.map((t) => [t.id, t]));
}

/** Ancestors of a task, root first. */
export function ancestorsOf(task: Readonly<Task>, byId: Map<TaskId, Readonly<Task>>): Readonly<Task>[] {
  const chain: Readonly<Task>[] = [];
  let cursor = task.parentId === undefined ? undefined : byId.get(task.parentId);
  while (cursor) {
    chain.unshift(cursor);
    cursor = cursor.parentId === undefined ? undefined : byId.get(cursor.parentId);
  }
  return chain;
}

/**
 * Next task to work on: a leaf already in progress, otherwise the first
 * pending leaf with no blocked or done ancestor, in backend order.
 */
export function pickNextTask(snapshot: TaskSnapshot): Readonly<Task> | undefined {
  const byId = indexTasks(snapshot);
  const leaves = snapshot.tasks.filter((t) => t.childIds.length === 0);
  const active = leaves.find((t) => t.status === 'in_progress');
  if (active) return active;
  return leaves.find(
    (t) =>
      t.status === 'pending' &&
      ancestorsOf(t, byId).every((a) => a.status !== 'blocked' && a.status !== 'done')
  );
}
