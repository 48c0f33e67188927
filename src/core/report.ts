import { z } from 'zod';
import { TASK_STATUSES, type StatusReport, type Task, type TaskSnapshot } from './types.js';

const SyncErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  at: z.number()
});

const CountsSchema = z.object({
  pending: z.number(),
  in_progress: z.number(),
  blocked: z.number(),
  done: z.number()
});

/** Status report as served by the status API. */
export const StatusReportSchema = z.object({
  projectId: z.string(),
  agentName: z.string(),
  auth: z.object({
    valid: z.boolean(),
    reason: z.string().optional(),
    account: z.object({ email: z.string(), apiVersion: z.string() }).optional()
  }),
  sync: z.object({
    syncedAt: z.string().nullable(),
    stale: z.boolean(),
    staleAfterMs: z.number(),
    consecutiveFailures: z.number(),
    lastError: SyncErrorSchema.optional(),
    inFlight: z.boolean()
  }),
  snapshotVersion: z.number(),
  taskCount: z.number(),
  counts: CountsSchema
});

export const TaskSnapshotSchema = z.object({
  projectId: z.string(),
  tasks: z.array(
    z.object({
      id: z.string(),
      title: z.string(),
      description: z.string().optional(),
      status: z.enum(TASK_STATUSES),
      parentId: z.string().optional(),
      childIds: z.array(z.string()),
      requirements: z.array(z.string()),
      notes: z.array(z.string()),
      updatedAt: z.number()
    })
  ),
  fetchedAt: z.number().nullable(),
  version: z.number()
});

/** One-line operator summary of a status report. */
export function formatStatusLine(r: StatusReport): string {
  const auth = r.auth.valid
    ? `auth ok${r.auth.account ? ` (${r.auth.account.email})` : ''}`
    : `auth INVALID (${r.auth.reason ?? 'unknown reason'})`;
  const sync = r.sync.syncedAt === null ? 'never synced' : `synced ${r.sync.syncedAt}${r.sync.stale ? ' (stale)' : ''}`;
  const failures =
    r.sync.consecutiveFailures > 0
      ? ` | ${r.sync.consecutiveFailures} failed sync(s)${r.sync.lastError ? `: ${r.sync.lastError.code}` : ''}`
      : '';
  const counts = TASK_STATUSES.map((s) => `${s} ${r.counts[s]}`).join(', ');
  return `${r.projectId} | ${auth} | ${sync}${failures} | ${r.taskCount} tasks (${counts})`;
}

/** Task tree as indented lines, parents before children, in backend order. */
export function formatTaskTree(snapshot: Pick<TaskSnapshot, 'tasks'>): string[] {
  const byId = new Map(snapshot.tasks.map((t) => [t.id, t]));
  const lines: string[] = [];

  const visit = (task: Readonly<Task>, depth: number) => {
    lines.push(`${'  '.repeat(depth)}[${task.status}] ${task.id} ${task.title}`);
    for (const childId of task.childIds) {
      const child = byId.get(childId);
      if (child) visit(child, depth + 1);
    }
  };

  for (const task of snapshot.tasks) {
    if (task.parentId === undefined) visit(task, 0);
  }
  return lines;
}
