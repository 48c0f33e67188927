import { TaskNoteSchema, TaskUpdateSchema } from '../../api/schemas.js';
import type { ToolContext } from './define.js';
import { defineTool } from './define.js';
import { toTaskView } from './views.js';

/**
 * Version the update is conditioned on: the agent's explicit value, or the
 * updatedAt of the task in the current snapshot, if it is there.
 */
export function resolveExpectedUpdatedAt(
  ctx: Pick<ToolContext, 'store'>,
  taskId: string,
  explicit: number | string | undefined
): number | undefined {
  if (typeof explicit === 'number') return explicit;
  if (typeof explicit === 'string') return Date.parse(explicit);
  return ctx.store.getSnapshot().tasks.find((t) => t.id === taskId)?.updatedAt;
}

export const taskUpdateTool = defineTool({
  name: 'tasklink_task_update',
  kind: 'write',
  description:
    'Update a task status and/or title on the backend. Fails with CONFLICT if the task changed on the backend since the version you read (expectedUpdatedAt, or the synced snapshot by default); re-read and decide before retrying. The snapshot is refreshed before the call returns.',
  inputSchema: {
    type: 'object',
    properties: {
      taskId: { type: 'string', description: 'Task ID' },
      status: {
        type: 'string',
        enum: ['pending', 'in_progress', 'blocked', 'done'],
        description: 'New status'
      },
      title: { type: 'string', description: 'New title' },
      expectedUpdatedAt: {
        type: ['number', 'string'],
        description: 'updatedAt of the version you read (ms timestamp or ISO string)'
      }
    },
    required: ['taskId']
  },
  args: TaskUpdateSchema,
  lockKey: (args) => `task:${args.taskId}`,
  handler: async (args, ctx) => {
    let expectedUpdatedAt = resolveExpectedUpdatedAt(ctx, args.taskId, args.expectedUpdatedAt);
    if (expectedUpdatedAt === undefined) {
      // Task created after the last sync: fetch it so the update keeps its precondition.
      await ctx.synchronizer.refreshNow(`lookup:${args.taskId}`);
      expectedUpdatedAt = resolveExpectedUpdatedAt(ctx, args.taskId, undefined);
    }
    const task = await ctx.gateway.submitTaskUpdate(args.taskId, {
      status: args.status,
      title: args.title,
      expectedUpdatedAt
    });
    ctx.log.info({ taskId: task.id, status: task.status }, 'task updated');
    return { task: toTaskView(task) };
  }
});

export const taskNoteTool = defineTool({
  name: 'tasklink_task_note',
  kind: 'write',
  description: 'Attach a note to a task (progress report, findings, handoff context).',
  inputSchema: {
    type: 'object',
    properties: {
      taskId: { type: 'string', description: 'Task ID' },
      content: { type: 'string', description: 'Note text' }
    },
    required: ['taskId', 'content']
  },
  args: TaskNoteSchema,
  lockKey: (args) => `task:${args.taskId}`,
  handler: async (args, ctx) => {
    const receipt = await ctx.gateway.addTaskNote(args.taskId, args.content);
    return { note: receipt };
  }
});

export const writeTools = [taskUpdateTool, taskNoteTool];
