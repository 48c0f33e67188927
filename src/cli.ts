#!/usr/bin/env node
import { z } from 'zod';
import { formatStatusLine, formatTaskTree, StatusReportSchema, TaskSnapshotSchema } from './core/report.js';

const API = process.env.TASKLINK_STATUS_URL ?? 'http://127.0.0.1:4178/api';
const API_KEY = process.env.TASKLINK_STATUS_API_KEY;

function usage(): void {
  console.log(`tasklink status CLI

Usage:
  tasklink status [--json]
  tasklink tasks [--status pending|in_progress|blocked|done] [--json]
  tasklink sync

Env:
  TASKLINK_STATUS_URL=http://127.0.0.1:4178/api
  TASKLINK_STATUS_API_KEY=<key>   (when the status API requires one)
`);
}

function getFlag(args: string[], name: string): string | undefined {
  const i = args.indexOf(name);
  if (i === -1) return undefined;
  return args[i + 1];
}

function envelope<S extends z.ZodTypeAny>(data: S) {
  return z.object({ ok: z.boolean(), data: data.optional(), error: z.string().optional() });
}

async function request(method: string, path: string): Promise<{ status: number; data: unknown }> {
  const res = await fetch(`${API}${path}`, {
    method,
    headers: API_KEY ? { 'x-api-key': API_KEY } : {}
  });
  const text = await res.text();
  let data: unknown = {};
  if (text.length > 0) {
    try {
      data = JSON.parse(text);
    } catch {
      data = { ok: false, error: text };
    }
  }
  return { status: res.status, data };
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0) return usage();

  const [command] = args;
  const json = args.includes('--json');

  if (command === 'status') {
    const r = await request('GET', '/status');
    const parsed = envelope(StatusReportSchema).safeParse(r.data);
    if (json || !parsed.success || !parsed.data.data) {
      console.log(JSON.stringify(r.data, null, 2));
    } else {
      console.log(formatStatusLine(parsed.data.data));
    }
    process.exit(r.status >= 400 ? 1 : 0);
  }

  if (command === 'tasks') {
    const status = getFlag(args, '--status');
    const r = await request('GET', '/tasks');
    const parsed = envelope(TaskSnapshotSchema).safeParse(r.data);
    if (json || !parsed.success || !parsed.data.data) {
      console.log(JSON.stringify(r.data, null, 2));
    } else {
      const snapshot = parsed.data.data;
      const lines = status
        ? snapshot.tasks.filter((t) => t.status === status).map((t) => `[${t.status}] ${t.id} ${t.title}`)
        : formatTaskTree(snapshot);
      console.log(lines.length > 0 ? lines.join('\n') : '(no tasks)');
    }
    process.exit(r.status >= 400 ? 1 : 0);
  }

  if (command === 'sync') {
    const r = await request('POST', '/sync');
    console.log(JSON.stringify(r.data, null, 2));
    process.exit(r.status >= 400 ? 1 : 0);
  }

  usage();
  process.exit(2);
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
