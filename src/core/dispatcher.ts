import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import {
  AuthError,
  BackendError,
  CancelledError,
  ConflictError,
  NotFoundError,
  ValidationError,
  toBridgeError,
  type BridgeError
} from './errors.js';
import { KeyedLock } from './keyed-lock.js';
import type { ToolRegistry } from './registry.js';
import type { RegisteredTool, ToolContext, ToolInputSchema } from './tools/define.js';

/** MCP tool result as sent to the agent. */
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type CallPhase = 'received' | 'validating' | 'dispatching' | 'reconciling' | 'completed';

export interface ToolListing {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ResourceListing {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ResourceContent {
  uri: string;
  mimeType: string;
  text: string;
}

export interface ErrorPayload {
  status: 'error';
  error: {
    code: string;
    category: BridgeError['category'];
    retryable: boolean;
    message: string;
    hint: string;
    details?: Record<string, unknown>;
  };
}

type Reconciliation =
  | { ok: true; snapshotVersion: number }
  | { ok: false; error: { code: string; message: string; retryable: boolean } };

interface PendingCall {
  id: string;
  tool: string;
  phase: CallPhase;
  startedAt: number;
  cancel: (err: CancelledError) => void;
  settled: Promise<unknown>;
}

const HINTS: Record<string, string> = {
  AUTH_REQUIRED: 'Ask the operator to update the API token, then call tasklink_verify_token.',
  NETWORK_ERROR: 'The backend could not be reached. Retry later.',
  CONFLICT: 'Re-read the task with tasklink_task_get and decide whether your change still applies.',
  VALIDATION_ERROR: 'Fix the arguments to match the tool input schema.',
  NOT_FOUND: 'Check the identifier. Call tasklink_sync if the snapshot may be outdated.',
  CANCELLED: 'The bridge is shutting down. Retry after it restarts.',
  CONFIG_ERROR: 'Ask the operator to fix the bridge configuration.'
};

function hintFor(error: BridgeError): string {
  if (error instanceof BackendError) {
    return error.retryable ? 'The backend failed. Retry later.' : 'The backend rejected the request. Check the arguments.';
  }
  return HINTS[error.code] ?? 'Unexpected bridge error. See the bridge logs.';
}

function detailsFor(error: BridgeError): Record<string, unknown> | undefined {
  if (error instanceof ValidationError) return { issues: error.issues };
  if (error instanceof BackendError) return { status: error.status };
  if (error instanceof ConflictError && error.taskId !== undefined) return { taskId: error.taskId };
  return undefined;
}

export function toErrorPayload(error: BridgeError): ErrorPayload {
  return {
    status: 'error',
    error: {
      code: error.code,
      category: error.category,
      retryable: error.retryable,
      message: error.message,
      hint: hintFor(error),
      details: detailsFor(error)
    }
  };
}

function textResult(payload: unknown, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

/**
 * Routes MCP requests to registry entries.
 *
 * Every tool call gets an id and is tracked until it settles so shutdown can
 * wait for it or abandon it. Failures never escape as exceptions, except for
 * unknown tool names, which the transport binding reports as protocol errors.
 */
export class ProtocolDispatcher {
  private readonly lock = new KeyedLock();
  private readonly pending = new Map<string, PendingCall>();
  private closing = false;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly ctx: ToolContext,
    private readonly log: Logger
  ) {}

  listTools(): ToolListing[] {
    return this.registry.listTools().map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema
    }));
  }

  listResources(): ResourceListing[] {
    return this.registry.listResources().map((r) => ({
      uri: r.uri,
      name: r.name,
      description: r.description,
      mimeType: r.mimeType
    }));
  }

  readResource(uri: string): ResourceContent {
    const resource = this.registry.getResource(uri);
    if (!resource) throw new NotFoundError('Resource', uri);
    const value = resource.read(this.ctx);
    return {
      uri,
      mimeType: resource.mimeType,
      text: typeof value === 'string' ? value : JSON.stringify(value, null, 2)
    };
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async callTool(name: string, rawArgs: unknown): Promise<ToolResult> {
    if (this.closing) {
      return textResult(toErrorPayload(new CancelledError('Server is shutting down; no new calls are accepted')), true);
    }
    const tool = this.registry.getTool(name);
    if (!tool) throw new NotFoundError('Tool', name);

    const id = nanoid(10);
    const callLog = this.log.child({ callId: id, tool: name });
    let cancel: (err: CancelledError) => void = () => undefined;
    const cancelled = new Promise<never>((_resolve, reject) => {
      cancel = reject;
    });
    const call: PendingCall = { id, tool: name, phase: 'received', startedAt: Date.now(), cancel, settled: cancelled };
    callLog.debug({ phase: call.phase }, 'tool call phase');

    const outcome = Promise.race([this.execute(tool, rawArgs, call, callLog), cancelled]);
    call.settled = outcome;
    this.pending.set(id, call);

    try {
      const payload = await outcome;
      return textResult(payload);
    } catch (err) {
      const error = toBridgeError(err);
      this.advance(call, 'completed', callLog);
      if (error.category === 'internal') {
        callLog.error({ err }, 'tool call failed');
      } else {
        callLog.info({ code: error.code, reason: error.message }, 'tool call rejected');
      }
      return textResult(toErrorPayload(error), true);
    } finally {
      this.pending.delete(id);
      callLog.debug({ durationMs: Date.now() - call.startedAt }, 'tool call settled');
    }
  }

  /**
   * Refuse new calls, give in-flight calls `graceMs` to finish, then
   * abandon the rest with CANCELLED. Abandoned backend requests are not
   * rolled back.
   */
  async close(graceMs: number): Promise<void> {
    this.closing = true;
    if (this.pending.size === 0) return;

    const inFlight = [...this.pending.values()];
    this.log.info({ inFlight: inFlight.length, graceMs }, 'waiting for in-flight tool calls');

    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const drained = Promise.allSettled(inFlight.map((c) => c.settled)).then(() => true);
    const finished = await Promise.race([drained, expired]);
    clearTimeout(timer);

    if (finished) return;
    for (const call of this.pending.values()) {
      this.log.warn({ callId: call.id, tool: call.tool, phase: call.phase }, 'abandoning tool call at shutdown');
      call.cancel(new CancelledError());
    }
  }

  private advance(call: PendingCall, phase: CallPhase, log: Logger): void {
    call.phase = phase;
    log.debug({ phase }, 'tool call phase');
  }

  private async execute(tool: RegisteredTool, rawArgs: unknown, call: PendingCall, log: Logger): Promise<unknown> {
    if (tool.requiresAuth && !this.ctx.store.isAuthenticated()) {
      const reason = this.ctx.store.getSession().invalidReason ?? 'credential was rejected by the backend';
      throw new AuthError(`Re-authentication required: ${reason}`);
    }

    this.advance(call, 'validating', log);
    const prepared = tool.prepare(rawArgs);

    const run = async (): Promise<unknown> => {
      this.advance(call, 'dispatching', log);
      let result: unknown;
      try {
        result = await prepared.execute(this.ctx);
      } catch (err) {
        if (err instanceof ConflictError) this.ctx.synchronizer.requestRefresh('conflict');
        throw err;
      }
      if (tool.kind !== 'write') {
        this.advance(call, 'completed', log);
        return result;
      }

      this.advance(call, 'reconciling', log);
      const reconciliation = await this.reconcile(tool.name);
      this.advance(call, 'completed', log);
      return { result, reconciliation };
    };

    return prepared.lockKey === undefined ? run() : this.lock.run(prepared.lockKey, run);
  }

  private async reconcile(toolName: string): Promise<Reconciliation> {
    const refreshed = await this.ctx.synchronizer.refreshNow(`after:${toolName}`);
    if (refreshed.ok) return { ok: true, snapshotVersion: refreshed.snapshot.version };
    const { code, message, retryable } = refreshed.error;
    return { ok: false, error: { code, message, retryable } };
  }
}
