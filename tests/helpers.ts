import pino, { type Logger } from 'pino';
import { createBridge, type Bridge } from '../src/bridge.js';
import { loadConfig, type BridgeConfig } from '../src/core/config.js';
import type { ToolResult } from '../src/core/dispatcher.js';

export const BASE_URL = 'https://backend.test/api';
export const TOKEN = 'test-secret';
export const PROJECT = 'P1';
export const T0 = 1_700_000_000_000;

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export class FakeClock {
  constructor(public t: number = T0) {}
  now = (): number => this.t;
  advance(ms: number): void {
    this.t += ms;
  }
}

export interface WireTaskFixture {
  task_designator: string;
  name: string;
  status: string;
  parent_designator?: string;
  requirements?: string[];
  notes?: string[];
  updated_at: number;
}

export function defaultTasks(): WireTaskFixture[] {
  return [
    { task_designator: 'T1', name: 'Build API', status: 'pending', updated_at: 1000 },
    { task_designator: 'T1.1', name: 'Design schema', status: 'done', parent_designator: 'T1', updated_at: 1000 },
    {
      task_designator: 'T1.2',
      name: 'Write handlers',
      status: 'pending',
      parent_designator: 'T1',
      requirements: ['R1'],
      updated_at: 1000
    },
    { task_designator: 'T2', name: 'Release', status: 'blocked', updated_at: 1000 },
    { task_designator: 'T2.1', name: 'Tag version', status: 'todo', parent_designator: 'T2', updated_at: 1000 }
  ];
}

export interface RecordedRequest {
  method: string;
  path: string;
  authorization: string | null;
  body: unknown;
}

type Reply = { status: number; body?: unknown; raw?: string };
type Override = { route: string; times: number; respond: (req: RecordedRequest, signal?: AbortSignal) => Promise<Reply> };

/**
 * In-process stand-in for the project backend, exposed as a `fetch`
 * implementation. Routes are matched as "METHOD /path" without the base URL.
 */
export class FakeBackend {
  readonly requests: RecordedRequest[] = [];
  tasks: WireTaskFixture[] = defaultTasks();
  validToken = TOKEN;
  private version = 1000;
  private noteSeq = 0;
  private overrides: Override[] = [];

  readonly fetch: typeof fetch = async (input, init) => {
    const href = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const url = new URL(href);
    const rawBody = init?.body;
    const req: RecordedRequest = {
      method: init?.method ?? 'GET',
      path: url.pathname.replace(/^\/api/, ''),
      authorization: new Headers(init?.headers).get('authorization'),
      body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined
    };
    this.requests.push(req);

    const override = this.takeOverride(`${req.method} ${req.path}`);
    const reply = override ? await override.respond(req, init?.signal ?? undefined) : this.handle(req);
    const text = reply.raw ?? (reply.body === undefined ? '' : JSON.stringify(reply.body));
    return new Response(text, { status: reply.status, headers: { 'content-type': 'application/json' } });
  };

  /** Requests that hit `route` ("METHOD /path"). */
  hits(route: string): RecordedRequest[] {
    return this.requests.filter((r) => `${r.method} ${r.path}` === route);
  }

  /** Answer the next `times` requests to `route` with a fixed response. */
  failNext(route: string, status: number, body: unknown = { message: `status ${status}` }, times = 1): void {
    this.overrides.push({ route, times, respond: async () => ({ status, body }) });
  }

  /** Answer the next request to `route` with a body that is not JSON. */
  garbleNext(route: string): void {
    this.overrides.push({ route, times: 1, respond: async () => ({ status: 200, raw: '<html>oops</html>' }) });
  }

  /** Fail the next `times` requests to `route` at the network level. */
  dropNext(route: string, times = 1): void {
    this.overrides.push({
      route,
      times,
      respond: async () => {
        throw new TypeError('fetch failed');
      }
    });
  }

  /** Never answer the next request to `route`; it only ends when aborted. */
  hangNext(route: string): void {
    this.overrides.push({
      route,
      times: 1,
      respond: (_req, signal) =>
        new Promise<Reply>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    });
  }

  /**
   * Hold the next request to `route` until `release()` is called, then
   * answer it normally.
   */
  holdNext(route: string): { release: () => void; reached: Promise<void> } {
    let release: () => void = () => undefined;
    let reached: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const reachedPromise = new Promise<void>((resolve) => {
      reached = resolve;
    });
    this.overrides.push({
      route,
      times: 1,
      respond: async (req) => {
        reached();
        await gate;
        return this.handle(req);
      }
    });
    return { release: () => release(), reached: reachedPromise };
  }

  /** Simulate another client editing a task. */
  touch(taskId: string, changes: Partial<Pick<WireTaskFixture, 'status' | 'name'>> = {}): void {
    const task = this.tasks.find((t) => t.task_designator === taskId);
    if (!task) throw new Error(`no fixture task ${taskId}`);
    Object.assign(task, changes, { updated_at: ++this.version });
  }

  private takeOverride(route: string): Override | undefined {
    const index = this.overrides.findIndex((o) => o.route === route);
    if (index === -1) return undefined;
    const override = this.overrides[index];
    if (!override) return undefined;
    override.times -= 1;
    if (override.times <= 0) this.overrides.splice(index, 1);
    return override;
  }

  private handle(req: RecordedRequest): Reply {
    if (req.authorization !== `Bearer ${this.validToken}`) {
      return { status: 401, body: { message: 'Invalid token' } };
    }

    const route = `${req.method} ${req.path}`;
    if (route === 'GET /account') {
      return { status: 200, body: { profile_email: 'agent@example.com', api_version: '1.2.0' } };
    }
    if (route === 'GET /projects') {
      return { status: 200, body: { projects: [{ project_id: PROJECT, name: 'Demo project' }] } };
    }
    if (route === `GET /projects/${PROJECT}/tasks`) {
      return { status: 200, body: { tasks: this.tasks.map((t) => ({ ...t })) } };
    }
    if (route === `POST /projects/${PROJECT}/requirements`) {
      const ids = readStringArray(req.body, 'requirement_designators');
      const requirements = ids
        .filter((id) => id === 'R1')
        .map((id) => ({
          requirement_designator: id,
          name: 'Handlers validate input',
          description: 'Every handler rejects malformed input.',
          status: 'approved',
          notes: []
        }));
      return { status: 200, body: { requirements } };
    }

    const taskMatch = /^\/projects\/P1\/tasks\/([^/]+)(\/notes)?$/.exec(req.path);
    if (taskMatch) {
      const taskId = decodeURIComponent(taskMatch[1] ?? '');
      const task = this.tasks.find((t) => t.task_designator === taskId);
      if (!task) return { status: 404, body: { message: `Task ${taskId} not found` } };

      if (req.method === 'POST' && taskMatch[2]) {
        task.notes = [...(task.notes ?? []), readString(req.body, 'content') ?? ''];
        return { status: 201, body: { note_id: `N${++this.noteSeq}`, timestamp: '2026-01-01T00:00:00.000Z' } };
      }
      if (req.method === 'PATCH') {
        const expected = readString(req.body, 'expected_updated_at');
        if (expected !== undefined && Date.parse(expected) !== task.updated_at) {
          return { status: 409, body: { message: `Task ${taskId} has changed` } };
        }
        const status = readString(req.body, 'status');
        const name = readString(req.body, 'name');
        if (status !== undefined) task.status = status;
        if (name !== undefined) task.name = name;
        task.updated_at = ++this.version;
        return { status: 200, body: { task: { ...task } } };
      }
    }

    const reqNoteMatch = /^\/projects\/P1\/requirements\/([^/]+)\/notes$/.exec(req.path);
    if (reqNoteMatch && req.method === 'POST') {
      return { status: 201, body: { note_id: `N${++this.noteSeq}` } };
    }

    return { status: 404, body: { message: 'Not found' } };
  }
}

function readString(body: unknown, key: string): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value : undefined;
}

function readStringArray(body: unknown, key: string): string[] {
  if (typeof body !== 'object' || body === null) return [];
  const value: unknown = Reflect.get(body, key);
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function testConfig(env: Record<string, string> = {}): BridgeConfig {
  return loadConfig(
    {
      TASKLINK_API_URL: BASE_URL,
      TASKLINK_API_TOKEN: TOKEN,
      TASKLINK_PROJECT_ID: PROJECT,
      TASKLINK_CONFIG_FILE: 'missing-config.json',
      TASKLINK_LOG_LEVEL: 'silent',
      TASKLINK_RETRY_BASE_MS: '0',
      TASKLINK_REQUEST_TIMEOUT_MS: '1000',
      TASKLINK_SYNC_INTERVAL_MS: '60000',
      TASKLINK_SYNC_MAX_INTERVAL_MS: '600000',
      TASKLINK_STALE_AFTER_MS: '60000',
      TASKLINK_SHUTDOWN_GRACE_MS: '50',
      ...env
    },
    '/nonexistent-tasklink-test-dir'
  );
}

export interface TestBridge {
  bridge: Bridge;
  backend: FakeBackend;
  clock: FakeClock;
}

/** Bridge wired to a fake backend and clock. Nothing is started. */
export function createTestBridge(env: Record<string, string> = {}): TestBridge {
  const backend = new FakeBackend();
  const clock = new FakeClock();
  const bridge = createBridge(testConfig(env), {
    log: silentLogger(),
    fetch: backend.fetch,
    now: clock.now,
    random: () => 0.5,
    sleep: async () => undefined
  });
  return { bridge, backend, clock };
}

/** Bridge with one successful sync already published. */
export async function createSyncedBridge(env: Record<string, string> = {}): Promise<TestBridge> {
  const ctx = createTestBridge(env);
  const result = await ctx.bridge.synchronizer.refreshNow('test-setup');
  if (!result.ok) throw result.error;
  return ctx;
}

/** Decode the JSON text of a tool result. */
export function payloadOf(result: ToolResult): unknown {
  const first = result.content[0];
  if (!first) throw new Error('tool result has no content');
  return JSON.parse(first.text);
}
