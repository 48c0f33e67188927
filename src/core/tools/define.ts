import type { Logger } from 'pino';
import type { z } from 'zod';
import type { BackendGateway } from '../../infra/gateway.js';
import { ValidationError } from '../errors.js';
import type { SessionStore } from '../store.js';
import type { StatusSynchronizer } from '../synchronizer.js';

/**
 * - `read`: served from the published snapshot
 * - `write`: sent to the backend, then reconciled with a refresh
 * - `backend`: uncached pass-through to the backend
 */
export type ToolKind = 'read' | 'write' | 'backend';

export interface ToolContext {
  store: SessionStore;
  gateway: BackendGateway;
  synchronizer: StatusSynchronizer;
  log: Logger;
}

/** JSON Schema advertised to MCP clients in tools/list. */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
};

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  kind: ToolKind;
  description: string;
  inputSchema: ToolInputSchema;
  args: S;
  /** Defaults to true: the tool fails fast while the credential is invalid. */
  requiresAuth?: boolean;
  /** Calls with the same key run one at a time. */
  lockKey?: (args: z.output<S>) => string;
  handler: (args: z.output<S>, ctx: ToolContext) => unknown;
}

export interface PreparedCall {
  lockKey?: string;
  execute(ctx: ToolContext): Promise<unknown>;
}

/** Type-erased tool as stored in the registry. */
export interface RegisteredTool {
  readonly name: string;
  readonly kind: ToolKind;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  readonly requiresAuth: boolean;
  /** Validate raw arguments; throws ValidationError. */
  prepare(raw: unknown): PreparedCall;
}

export interface RegisteredResource {
  readonly uri: string;
  readonly name: string;
  readonly description: string;
  readonly mimeType: 'application/json' | 'text/markdown';
  /** Strings are served as-is; anything else as pretty-printed JSON. */
  read(ctx: Pick<ToolContext, 'store'>): unknown;
}

function toValidationError(tool: string, error: z.ZodError): ValidationError {
  const issues = error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
  return new ValidationError(`Invalid arguments for ${tool}: ${issues.join('; ')}`, issues);
}

export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): RegisteredTool {
  return {
    name: spec.name,
    kind: spec.kind,
    description: spec.description,
    inputSchema: spec.inputSchema,
    requiresAuth: spec.requiresAuth ?? true,
    prepare(raw: unknown): PreparedCall {
      const parsed = spec.args.safeParse(raw ?? {});
      if (!parsed.success) throw toValidationError(spec.name, parsed.error);
      const args: z.output<S> = parsed.data;
      return {
        lockKey: spec.lockKey?.(args),
        execute: async (ctx) => spec.handler(args, ctx)
      };
    }
  };
}
