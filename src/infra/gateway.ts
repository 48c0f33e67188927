import type { Logger } from 'pino';
import type { z } from 'zod';
import {
  AuthError,
  BackendError,
  BridgeError,
  ConflictError,
  NetworkError
} from '../core/errors.js';
import {
  buildTaskTree,
  mapNote,
  mapProject,
  mapRequirement,
  mapTask
} from '../core/mappers.js';
import type { SessionStore } from '../core/store.js';
import type {
  AuthResult,
  NoteReceipt,
  Project,
  ProjectId,
  Requirement,
  RequirementId,
  Task,
  TaskId,
  TaskPatch,
  TaskSnapshot
} from '../core/types.js';
import {
  AccountBody,
  ErrorBody,
  NoteBody,
  ProjectListBody,
  RequirementListBody,
  TaskBody,
  TaskListBody
} from './wire.js';

const MAX_BODY_CHARS = 2000;

/** The slice of the session store the gateway needs. */
export type CredentialSource = Pick<
  SessionStore,
  'getSession' | 'isAuthenticated' | 'invalidateCredential' | 'markAuthenticated'
>;

export interface GatewayOptions {
  timeoutMs: number;
  /** Total attempts per call, including the first. */
  retryAttempts: number;
  retryBaseMs: number;
  fetch?: typeof fetch;
  now?: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

type HttpMethod = 'GET' | 'POST' | 'PATCH';

interface RequestOptions {
  body?: unknown;
  /** Token to use instead of the session's. */
  token?: string;
  /** Skip the fail-fast check on an invalidated session. */
  bypassAuthGate?: boolean;
  taskId?: TaskId;
}

interface RawResponse {
  status: number;
  text: string;
}

/**
 * Delay before retry number `retry` (1-based): exponential in the retry
 * number, with the upper half jittered.
 */
export function computeRetryDelay(retry: number, baseMs: number, random: () => number = Math.random): number {
  const ceiling = baseMs * 2 ** (retry - 1);
  return Math.round(ceiling / 2 + (random() * ceiling) / 2);
}

function clip(s: string): string {
  return s.length <= MAX_BODY_CHARS ? s : `${s.slice(0, MAX_BODY_CHARS)}…`;
}

function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function seg(value: string): string {
  return encodeURIComponent(value);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function errorMessage(text: string): string | undefined {
  const parsed = ErrorBody.safeParse(parseJson(text));
  return parsed.success ? (parsed.data.message ?? parsed.data.error) : undefined;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Typed client for the remote project backend.
 *
 * Every call has a timeout. Network failures and 5xx responses are retried
 * with backoff; 401/403 invalidate the session credential so later calls
 * fail fast; 409/412 surface as conflicts; other 4xx are returned as-is.
 */
export class BackendGateway {
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly credentials: CredentialSource,
    private readonly log: Logger,
    private readonly opts: GatewayOptions
  ) {
    this.fetchImpl = opts.fetch ?? globalThis.fetch;
    this.now = opts.now ?? Date.now;
    this.random = opts.random ?? Math.random;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Verify a credential and fetch the account behind it. Without arguments
   * the session token is checked and, on success, the session is marked
   * authenticated again.
   */
  async authenticate(credentials?: { token: string }): Promise<AuthResult> {
    const sessionToken = this.credentials.getSession().token;
    const token = credentials?.token ?? sessionToken;
    const started = this.now();
    const body = await this.request('GET', 'account', AccountBody, { token, bypassAuthGate: true });
    const account = { email: body.profile_email, apiVersion: body.api_version };
    // the session token may have been replaced while the check was in flight
    if (token === this.credentials.getSession().token) this.credentials.markAuthenticated(account);
    return { account, latencyMs: this.now() - started };
  }

  async fetchProjectState(projectId: ProjectId): Promise<TaskSnapshot> {
    const body = await this.request('GET', `projects/${seg(projectId)}/tasks`, TaskListBody);
    return {
      projectId,
      tasks: buildTaskTree(body.tasks, this.log),
      fetchedAt: this.now(),
      version: 0
    };
  }

  async submitTaskUpdate(taskId: TaskId, patch: TaskPatch): Promise<Task> {
    const { projectId } = this.credentials.getSession();
    const payload: Record<string, string> = {};
    if (patch.status !== undefined) payload.status = patch.status;
    if (patch.title !== undefined) payload.name = patch.title;
    if (patch.expectedUpdatedAt !== undefined) {
      payload.expected_updated_at = new Date(patch.expectedUpdatedAt).toISOString();
    }
    const body = await this.request(
      'PATCH',
      `projects/${seg(projectId)}/tasks/${seg(taskId)}`,
      TaskBody,
      { body: payload, taskId }
    );
    return mapTask(body.task);
  }

  async addTaskNote(taskId: TaskId, content: string): Promise<NoteReceipt> {
    const { projectId } = this.credentials.getSession();
    const body = await this.request(
      'POST',
      `projects/${seg(projectId)}/tasks/${seg(taskId)}/notes`,
      NoteBody,
      { body: { content }, taskId }
    );
    return mapNote(taskId, body);
  }

  async listProjects(): Promise<Project[]> {
    const body = await this.request('GET', 'projects', ProjectListBody);
    return body.projects.map(mapProject);
  }

  async getRequirements(ids: RequirementId[]): Promise<Requirement[]> {
    const { projectId } = this.credentials.getSession();
    const body = await this.request('POST', `projects/${seg(projectId)}/requirements`, RequirementListBody, {
      body: { requirement_designators: ids }
    });
    return body.requirements.map(mapRequirement);
  }

  async addRequirementNote(requirementId: RequirementId, content: string): Promise<NoteReceipt> {
    const { projectId } = this.credentials.getSession();
    const body = await this.request(
      'POST',
      `projects/${seg(projectId)}/requirements/${seg(requirementId)}/notes`,
      NoteBody,
      { body: { content } }
    );
    return mapNote(requirementId, body);
  }

  // ==================== TRANSPORT ====================

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const session = this.credentials.getSession();
    if (!options.bypassAuthGate && !this.credentials.isAuthenticated()) {
      throw new AuthError(
        `Re-authentication required: ${session.invalidReason ?? 'credential was rejected by the backend'}`
      );
    }

    const token = options.token ?? session.token;
    const url = joinUrl(session.baseUrl, path);
    const maxAttempts = this.opts.retryAttempts;
    let lastError: BridgeError = new NetworkError(`Request failed after ${maxAttempts} attempts`);

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (attempt > 1) {
        const delayMs = computeRetryDelay(attempt - 1, this.opts.retryBaseMs, this.random);
        this.log.debug({ method, path, attempt, delayMs }, 'retrying backend request');
        if (delayMs > 0) await this.sleep(delayMs);
      }

      let res: RawResponse;
      try {
        res = await this.send(method, url, token, options.body);
      } catch (err) {
        if (!(err instanceof NetworkError)) throw err;
        lastError = err;
        this.log.warn({ method, path, attempt, maxAttempts, err: err.message }, 'backend request failed');
        continue;
      }

      if (res.status >= 200 && res.status < 300) {
        return this.decode(res, schema);
      }

      if (res.status === 401 || res.status === 403) {
        const reason = `backend rejected credential (${res.status})`;
        if (token === this.credentials.getSession().token) this.credentials.invalidateCredential(reason);
        throw new AuthError(`Re-authentication required: ${reason}`);
      }

      if (res.status === 409 || res.status === 412) {
        const fallback = options.taskId
          ? `Task ${options.taskId} was modified on the backend since it was last read`
          : 'Target was modified on the backend since it was last read';
        throw new ConflictError(errorMessage(res.text) ?? fallback, options.taskId);
      }

      const error = new BackendError(res.status, clip(res.text), errorMessage(res.text));
      if (!error.retryable) throw error;

      lastError = error;
      this.log.warn({ method, path, attempt, maxAttempts, status: res.status }, 'backend server error');
    }

    throw lastError;
  }

  private async send(method: HttpMethod, url: string, token: string, body: unknown): Promise<RawResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.opts.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: {
          authorization: `Bearer ${token}`,
          accept: 'application/json',
          ...(body === undefined ? {} : { 'content-type': 'application/json' })
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal
      });
      const text = await response.text();
      return { status: response.status, text };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new NetworkError(`Request timed out after ${this.opts.timeoutMs}ms`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Network error: ${reason}`);
    } finally {
      clearTimeout(timer);
    }
  }

  private decode<S extends z.ZodTypeAny>(res: RawResponse, schema: S): z.output<S> {
    let json: unknown;
    try {
      json = res.text.length > 0 ? JSON.parse(res.text) : {};
    } catch {
      throw new BackendError(res.status, clip(res.text), 'Backend returned invalid JSON');
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new BackendError(res.status, clip(res.text), `Unexpected response from backend: ${issues}`);
    }
    return parsed.data;
  }
}
