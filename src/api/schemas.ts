import { z } from 'zod';
import { TASK_STATUSES } from '../core/types.js';

const TaskId = z.string().min(1).max(120);
const NoteContent = z.string().min(1).max(10000);

export const StatusSchema = z.object({});

export const TaskListSchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  parentId: TaskId.optional(),
  rootsOnly: z.boolean().optional(),
  limit: z.coerce.number().int().min(1).max(500).optional()
});

export const TaskGetSchema = z.object({
  taskId: TaskId
});

export const NextTaskSchema = z.object({});

export const TaskUpdateSchema = z
  .object({
    taskId: TaskId,
    status: z.enum(TASK_STATUSES).optional(),
    title: z.string().min(1).max(200).optional(),
    // ms timestamp or ISO string of the version the agent last saw
    expectedUpdatedAt: z.union([z.number().int().nonnegative(), z.string().datetime({ offset: true })]).optional()
  })
  .refine((v) => v.status !== undefined || v.title !== undefined, {
    message: 'Provide status and/or title',
    path: ['status']
  });

export const TaskNoteSchema = z.object({
  taskId: TaskId,
  content: NoteContent
});

export const ProjectListSchema = z.object({});

export const RequirementGetSchema = z.object({
  requirementIds: z.array(z.string().min(1).max(120)).min(1).max(50)
});

export const RequirementNoteSchema = z.object({
  requirementId: z.string().min(1).max(120),
  content: NoteContent
});

export const VerifyTokenSchema = z.object({
  token: z.string().min(1).optional()
});

export const SyncSchema = z.object({});

// Status HTTP API
export const EventsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional()
});
