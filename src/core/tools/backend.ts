import {
  ProjectListSchema,
  RequirementGetSchema,
  RequirementNoteSchema,
  SyncSchema,
  VerifyTokenSchema
} from '../../api/schemas.js';
import { AuthError } from '../errors.js';
import { defineTool } from './define.js';

export const projectListTool = defineTool({
  name: 'tasklink_project_list',
  kind: 'backend',
  description: 'List the projects visible to the configured credential. Always asks the backend.',
  inputSchema: { type: 'object', properties: {}, required: [] },
  args: ProjectListSchema,
  handler: async (_args, ctx) => {
    const projects = await ctx.gateway.listProjects();
    return { data: { count: projects.length, projects } };
  }
});

export const requirementGetTool = defineTool({
  name: 'tasklink_requirement_get',
  kind: 'backend',
  description:
    'Fetch requirements of the current project by ID, e.g. the IDs listed on a task. Always asks the backend.',
  inputSchema: {
    type: 'object',
    properties: {
      requirementIds: {
        type: 'array',
        items: { type: 'string' },
        description: 'Requirement IDs (1-50)'
      }
    },
    required: ['requirementIds']
  },
  args: RequirementGetSchema,
  handler: async (args, ctx) => {
    const requirements = await ctx.gateway.getRequirements(args.requirementIds);
    const found = new Set(requirements.map((r) => r.id));
    return {
      data: {
        requirements,
        missing: args.requirementIds.filter((id) => !found.has(id))
      }
    };
  }
});

export const requirementNoteTool = defineTool({
  name: 'tasklink_requirement_note',
  kind: 'backend',
  description: 'Attach a note to a requirement, e.g. a question or an ambiguity found while implementing it.',
  inputSchema: {
    type: 'object',
    properties: {
      requirementId: { type: 'string', description: 'Requirement ID' },
      content: { type: 'string', description: 'Note text' }
    },
    required: ['requirementId', 'content']
  },
  args: RequirementNoteSchema,
  handler: async (args, ctx) => {
    const note = await ctx.gateway.addRequirementNote(args.requirementId, args.content);
    return { data: { note } };
  }
});

export const verifyTokenTool = defineTool({
  name: 'tasklink_verify_token',
  kind: 'backend',
  description:
    'Check an API token against the backend. Without a token, re-checks the configured one; success restores a session whose credential was rejected earlier.',
  inputSchema: {
    type: 'object',
    properties: {
      token: { type: 'string', description: 'Token to check instead of the configured one' }
    },
    required: []
  },
  args: VerifyTokenSchema,
  requiresAuth: false,
  handler: async (args, ctx) => {
    const checkingSession = args.token === undefined || args.token === ctx.store.getSession().token;
    try {
      const result = await ctx.gateway.authenticate(args.token === undefined ? undefined : { token: args.token });
      if (checkingSession) ctx.synchronizer.wake();
      return { data: { valid: true, account: result.account, latencyMs: result.latencyMs } };
    } catch (err) {
      if (err instanceof AuthError) {
        return { data: { valid: false, reason: err.message } };
      }
      throw err;
    }
  }
});

export const syncTool = defineTool({
  name: 'tasklink_sync',
  kind: 'backend',
  description:
    'Refresh the task snapshot from the backend now and wait for the result. Normally not needed: the bridge syncs in the background.',
  inputSchema: { type: 'object', properties: {}, required: [] },
  args: SyncSchema,
  handler: async (_args, ctx) => {
    const result = await ctx.synchronizer.refreshNow('manual');
    if (!result.ok) throw result.error;
    return {
      data: {
        snapshotVersion: result.snapshot.version,
        taskCount: result.snapshot.tasks.length,
        syncedAt: ctx.store.freshness().syncedAt
      }
    };
  }
});

export const backendTools = [projectListTool, requirementGetTool, requirementNoteTool, verifyTokenTool, syncTool];
