import {
  NextTaskSchema,
  StatusSchema,
  TaskGetSchema,
  TaskListSchema
} from '../../api/schemas.js';
import { NotFoundError } from '../errors.js';
import type { Freshness } from '../store.js';
import type { StatusReport, Task } from '../types.js';
import { defineTool, type ToolContext } from './define.js';
import { ancestorsOf, indexTasks, pickNextTask, toTaskSummary, toTaskView } from './views.js';

const DEFAULT_LIST_LIMIT = 100;

const STATUS_ENUM = ['pending', 'in_progress', 'blocked', 'done'];

/**
 * Report freshness for a read and, when the snapshot is stale, start a
 * background refresh. The read itself never waits for it.
 */
function observe(ctx: ToolContext): Freshness {
  const freshness = ctx.store.freshness();
  if (freshness.stale && ctx.store.isAuthenticated()) {
    ctx.synchronizer.requestRefresh('stale-read');
  }
  return freshness;
}

export function adviseNextAction(report: StatusReport, next: Readonly<Task> | undefined): string {
  if (!report.auth.valid) {
    return 'The backend credential is invalid. Ask the operator to update the API token.';
  }
  if (report.sync.syncedAt === null) {
    return 'Waiting for the first sync with the backend; check again shortly.';
  }
  if (next) {
    return next.status === 'in_progress'
      ? `Continue task ${next.id}: ${next.title}`
      : `Start task ${next.id}: ${next.title}`;
  }
  if (report.counts.blocked > 0) {
    return `No workable task: ${report.counts.blocked} task(s) blocked.`;
  }
  return 'No open tasks in this project.';
}

export const statusTool = defineTool({
  name: 'tasklink_status',
  kind: 'read',
  description:
    'Get bridge status: authentication, last sync time, staleness, sync failures and task counts by status, plus an advised next action. Works even when the credential is invalid.',
  inputSchema: { type: 'object', properties: {}, required: [] },
  args: StatusSchema,
  requiresAuth: false,
  handler: (_args, ctx) => {
    const freshness = observe(ctx);
    const report = ctx.store.status();
    const next = pickNextTask(ctx.store.getSnapshot());
    return {
      data: { ...report, advisedAction: adviseNextAction(report, next) },
      freshness
    };
  }
});

export const taskListTool = defineTool({
  name: 'tasklink_task_list',
  kind: 'read',
  description:
    'List tasks from the last synced snapshot. Filter by status or parent task; rootsOnly returns top-level tasks. Returns immediately and reports whether the data is stale.',
  inputSchema: {
    type: 'object',
    properties: {
      status: { type: 'string', enum: STATUS_ENUM, description: 'Only tasks with this status' },
      parentId: { type: 'string', description: 'Only direct children of this task' },
      rootsOnly: { type: 'boolean', description: 'Only tasks without a parent' },
      limit: { type: 'number', description: `Max tasks to return (1-500, default ${DEFAULT_LIST_LIMIT})` }
    },
    required: []
  },
  args: TaskListSchema,
  handler: (args, ctx) => {
    const freshness = observe(ctx);
    const matching = ctx.store.getSnapshot().tasks.filter(
      (t) =>
        (args.status === undefined || t.status === args.status) &&
        (args.parentId === undefined || t.parentId === args.parentId) &&
        (!args.rootsOnly || t.parentId === undefined)
    );
    const limit = args.limit ?? DEFAULT_LIST_LIMIT;
    return {
      data: {
        total: matching.length,
        count: Math.min(limit, matching.length),
        tasks: matching.slice(0, limit).map(toTaskSummary)
      },
      freshness
    };
  }
});

export const taskGetTool = defineTool({
  name: 'tasklink_task_get',
  kind: 'read',
  description:
    'Get one task from the last synced snapshot, with its children and its parent chain. Includes updatedAt, which task updates use to detect conflicting edits.',
  inputSchema: {
    type: 'object',
    properties: {
      taskId: { type: 'string', description: 'Task ID' }
    },
    required: ['taskId']
  },
  args: TaskGetSchema,
  handler: (args, ctx) => {
    const freshness = observe(ctx);
    const byId = indexTasks(ctx.store.getSnapshot());
    const task = byId.get(args.taskId);
    if (!task) throw new NotFoundError('Task', args.taskId);

    const children = task.childIds.flatMap((id) => {
      const child = byId.get(id);
      return child ? [toTaskSummary(child)] : [];
    });
    return {
      data: {
        task: toTaskView(task),
        children,
        ancestors: ancestorsOf(task, byId).map(toTaskSummary)
      },
      freshness
    };
  }
});

export const nextTaskTool = defineTool({
  name: 'tasklink_next_task',
  kind: 'read',
  description:
    'Get the task to work on next: a leaf task already in progress, otherwise the first pending leaf task that is not under a blocked or done parent.',
  inputSchema: { type: 'object', properties: {}, required: [] },
  args: NextTaskSchema,
  handler: (_args, ctx) => {
    const freshness = observe(ctx);
    const next = pickNextTask(ctx.store.getSnapshot());
    return {
      data: next
        ? { task: toTaskView(next), message: `Next task: ${next.id}` }
        : { task: null, message: 'No task available' },
      freshness
    };
  }
});

export const readTools = [statusTool, taskListTool, taskGetTool, nextTaskTool];
