import { describe, it, expect } from 'vitest';
import { StateError } from '../src/core/errors.js';
import { ToolRegistry, defaultResources } from '../src/core/registry.js';
import { adviseNextAction, statusTool, taskGetTool } from '../src/core/tools/read.js';
import type { StatusReport, Task } from '../src/core/types.js';

function report(overrides: Partial<StatusReport> = {}): StatusReport {
  return {
    projectId: 'P1',
    agentName: 'tester',
    auth: { valid: true },
    sync: { syncedAt: '2023-11-14T22:13:20.000Z', stale: false, staleAfterMs: 60_000, consecutiveFailures: 0, inFlight: false },
    snapshotVersion: 1,
    taskCount: 0,
    counts: { pending: 0, in_progress: 0, blocked: 0, done: 0 },
    ...overrides
  };
}

const task = (status: Task['status']): Task => ({
  id: 'T7',
  title: 'Ship it',
  status,
  childIds: [],
  requirements: [],
  notes: [],
  updatedAt: 0
});

describe('ToolRegistry', () => {
  it('rejects duplicate tool names', () => {
    expect(() => new ToolRegistry([statusTool, taskGetTool, statusTool], [])).toThrow(StateError);
    expect(() => new ToolRegistry([statusTool], [])).not.toThrow();
  });

  it('rejects duplicate resource uris', () => {
    const first = defaultResources[0];
    if (!first) throw new Error('no default resources');
    expect(() => new ToolRegistry([], [first, first])).toThrow('Duplicate resource uri: tasklink://status');
  });
});

describe('adviseNextAction', () => {
  it('puts an invalid credential first', () => {
    expect(adviseNextAction(report({ auth: { valid: false } }), task('pending'))).toBe(
      'The backend credential is invalid. Ask the operator to update the API token.'
    );
  });

  it('waits for the first sync', () => {
    const r = report();
    expect(adviseNextAction({ ...r, sync: { ...r.sync, syncedAt: null } }, undefined)).toBe(
      'Waiting for the first sync with the backend; check again shortly.'
    );
  });

  it('continues or starts the next task', () => {
    expect(adviseNextAction(report(), task('in_progress'))).toBe('Continue task T7: Ship it');
    expect(adviseNextAction(report(), task('pending'))).toBe('Start task T7: Ship it');
  });

  it('explains why there is nothing to do', () => {
    expect(adviseNextAction(report({ counts: { pending: 0, in_progress: 0, blocked: 2, done: 1 } }), undefined)).toBe(
      'No workable task: 2 task(s) blocked.'
    );
    expect(adviseNextAction(report(), undefined)).toBe('No open tasks in this project.');
  });
});
