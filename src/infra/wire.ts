import { z } from 'zod';

// Backend JSON bodies. Field names follow the backend (snake_case); the
// mappers in core/mappers.ts turn them into domain objects.

const Timestamp = z.union([z.number(), z.string()]);

export const WireTaskSchema = z.object({
  task_designator: z.string().min(1),
  name: z.string(),
  description: z.string().nullish(),
  status: z.enum(['pending', 'todo', 'in_progress', 'review', 'blocked', 'done']),
  parent_designator: z.string().nullish(),
  requirements: z.array(z.string()).default([]),
  notes: z.array(z.string()).default([]),
  updated_at: Timestamp
});
export type WireTask = z.infer<typeof WireTaskSchema>;

export const TaskListBody = z.object({
  tasks: z.array(WireTaskSchema)
});

export const TaskBody = z.object({
  task: WireTaskSchema
});

export const AccountBody = z.object({
  profile_email: z.string(),
  api_version: z.string()
});

export const WireProjectSchema = z.object({
  project_id: z.string(),
  name: z.string(),
  description: z.string().nullish()
});
export type WireProject = z.infer<typeof WireProjectSchema>;

export const ProjectListBody = z.object({
  projects: z.array(WireProjectSchema).default([])
});

export const WireRequirementSchema = z.object({
  requirement_designator: z.string(),
  name: z.string(),
  description: z.string(),
  status: z.enum(['approved', 'pending_review', 'draft', 'rejected']),
  notes: z.array(z.string()).default([])
});
export type WireRequirement = z.infer<typeof WireRequirementSchema>;

export const RequirementListBody = z.object({
  requirements: z.array(WireRequirementSchema).default([])
});

export const NoteBody = z.object({
  note_id: z.string().nullish(),
  timestamp: z.string().nullish()
});
export type WireNote = z.infer<typeof NoteBody>;

/** Error body most backend endpoints return on 4xx. */
export const ErrorBody = z.object({
  message: z.string().optional(),
  error: z.string().optional()
});
