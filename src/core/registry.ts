import { StateError } from './errors.js';
import type { RegisteredResource, RegisteredTool } from './tools/define.js';
import { backendTools } from './tools/backend.js';
import { readTools } from './tools/read.js';
import { writeTools } from './tools/write.js';

const AGENT_GUIDE = `# Tasklink Agent Guide

## Reading
- \`tasklink_next_task\` tells you what to work on.
- \`tasklink_task_list\` and \`tasklink_task_get\` read the last synced snapshot. They answer immediately;
  check \`freshness.stale\` before acting on old data.
- \`tasklink_requirement_get\` fetches the requirements a task references.

## Writing
1. Read the task with \`tasklink_task_get\` and keep its \`updatedAt\`.
2. Move it to \`in_progress\` with \`tasklink_task_update\` when you start.
3. Record progress with \`tasklink_task_note\`.
4. Move it to \`done\` when finished.

A CONFLICT error means someone else changed the task after you read it. Re-read it and
decide whether your change still applies. Writes are never retried automatically.

## Errors
Every failed call returns \`{ status: "error", error: { code, category, retryable, message, hint } }\`.
- \`transient\`: retry later
- \`business\`: fix the request or re-read
- \`operator\`: ask a human (usually the API token)
`;

/**
 * Fixed table of tools and resources, built once at startup. Names are
 * unique; a duplicate is a programming error.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly resources = new Map<string, RegisteredResource>();

  constructor(tools: RegisteredTool[], resources: RegisteredResource[]) {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) throw new StateError(`Duplicate tool name: ${tool.name}`);
      this.tools.set(tool.name, tool);
    }
    for (const resource of resources) {
      if (this.resources.has(resource.uri)) throw new StateError(`Duplicate resource uri: ${resource.uri}`);
      this.resources.set(resource.uri, resource);
    }
  }

  getTool(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  listTools(): RegisteredTool[] {
    return [...this.tools.values()];
  }

  getResource(uri: string): RegisteredResource | undefined {
    return this.resources.get(uri);
  }

  listResources(): RegisteredResource[] {
    return [...this.resources.values()];
  }
}

export const defaultResources: RegisteredResource[] = [
  {
    uri: 'tasklink://status',
    name: 'Bridge Status',
    description: 'Authentication, sync freshness and task counts',
    mimeType: 'application/json',
    read: (ctx) => ctx.store.status()
  },
  {
    uri: 'tasklink://tasks',
    name: 'Task Snapshot',
    description: 'The last synced task snapshot',
    mimeType: 'application/json',
    read: (ctx) => ctx.store.getSnapshot()
  },
  {
    uri: 'tasklink://guide',
    name: 'Agent Guide',
    description: 'How agents are expected to read and update tasks',
    mimeType: 'text/markdown',
    read: () => AGENT_GUIDE
  }
];

export function createDefaultRegistry(): ToolRegistry {
  return new ToolRegistry([...readTools, ...writeTools, ...backendTools], defaultResources);
}
