import type { Logger } from 'pino';
import type { WireNote, WireProject, WireRequirement, WireTask } from '../infra/wire.js';
import type {
  NoteReceipt,
  Project,
  ProjectId,
  Requirement,
  Task,
  TaskCounts,
  TaskId,
  TaskSnapshot,
  TaskStatus
} from './types.js';

// Backend statuses outside the bridge's four are folded into the closest one.
const STATUS_ALIASES: Record<WireTask['status'], TaskStatus> = {
  pending: 'pending',
  todo: 'pending',
  in_progress: 'in_progress',
  review: 'in_progress',
  blocked: 'blocked',
  done: 'done'
};

export function mapStatus(status: WireTask['status']): TaskStatus {
  return STATUS_ALIASES[status];
}

export function parseTimestamp(value: number | string): number {
  if (typeof value === 'number') return value;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? 0 : ms;
}

export function mapTask(wire: WireTask): Task {
  return {
    id: wire.task_designator,
    title: wire.name,
    description: wire.description ?? undefined,
    status: mapStatus(wire.status),
    parentId: wire.parent_designator ?? undefined,
    childIds: [],
    requirements: [...wire.requirements],
    notes: [...wire.notes],
    updatedAt: parseTimestamp(wire.updated_at)
  };
}

/**
 * Build the task tree from the backend's flat list. Parent links to unknown
 * tasks, and links that would close a cycle, are dropped.
 */
export function buildTaskTree(wire: readonly WireTask[], log?: Logger): Task[] {
  const tasks = wire.map(mapTask);
  const byId = new Map<TaskId, Task>();
  for (const task of tasks) {
    if (byId.has(task.id)) {
      log?.warn({ taskId: task.id }, 'duplicate task id in backend response; keeping first');
      continue;
    }
    byId.set(task.id, task);
  }
  const unique = [...byId.values()];

  for (const task of unique) {
    if (task.parentId === undefined) continue;
    if (!byId.has(task.parentId)) {
      log?.warn({ taskId: task.id, parentId: task.parentId }, 'parent task not found; treating as root');
      task.parentId = undefined;
      continue;
    }
    if (closesCycle(task, byId)) {
      log?.warn({ taskId: task.id, parentId: task.parentId }, 'parent link forms a cycle; treating as root');
      task.parentId = undefined;
    }
  }

  for (const task of unique) {
    if (task.parentId !== undefined) {
      byId.get(task.parentId)?.childIds.push(task.id);
    }
  }
  return unique;
}

function closesCycle(start: Task, byId: Map<TaskId, Task>): boolean {
  const seen = new Set<TaskId>([start.id]);
  let cursor = start.parentId;
  while (cursor !== undefined) {
    if (seen.has(cursor)) return true;
    seen.add(cursor);
    cursor = byId.get(cursor)?.parentId;
  }
  return false;
}

/** Freeze a snapshot deeply so no reader can mutate shared state. */
export function freezeSnapshot(snapshot: TaskSnapshot): TaskSnapshot {
  for (const task of snapshot.tasks) {
    Object.freeze(task.childIds);
    Object.freeze(task.requirements);
    Object.freeze(task.notes);
    Object.freeze(task);
  }
  Object.freeze(snapshot.tasks);
  return Object.freeze(snapshot);
}

export function emptySnapshot(projectId: ProjectId): TaskSnapshot {
  return freezeSnapshot({ projectId, tasks: [], fetchedAt: null, version: 0 });
}

export function countByStatus(tasks: readonly Readonly<Task>[]): TaskCounts {
  const counts: TaskCounts = { pending: 0, in_progress: 0, blocked: 0, done: 0 };
  for (const task of tasks) counts[task.status] += 1;
  return counts;
}

export function mapProject(wire: WireProject): Project {
  return { id: wire.project_id, name: wire.name, description: wire.description ?? undefined };
}

export function mapRequirement(wire: WireRequirement): Requirement {
  return {
    id: wire.requirement_designator,
    name: wire.name,
    description: wire.description,
    status: wire.status,
    notes: [...wire.notes]
  };
}

export function mapNote(targetId: string, wire: WireNote): NoteReceipt {
  return {
    targetId,
    noteId: wire.note_id ?? undefined,
    createdAt: wire.timestamp ?? undefined
  };
}
