import { describe, it, expect } from 'vitest';
import { NetworkError } from '../src/core/errors.js';
import { buildTaskTree } from '../src/core/mappers.js';
import { SessionStore } from '../src/core/store.js';
import type { BridgeEvent, TaskSnapshot } from '../src/core/types.js';
import { BASE_URL, FakeClock, PROJECT, TOKEN, T0, silentLogger } from './helpers.js';

function makeStore(clock = new FakeClock()) {
  const store = new SessionStore(
    { projectId: PROJECT, baseUrl: BASE_URL, token: TOKEN, agentName: 'tester' },
    silentLogger(),
    { staleAfterMs: 60_000, now: clock.now }
  );
  const events: BridgeEvent[] = [];
  store.setEventListener((evt) => events.push(evt));
  return { store, clock, events };
}

function snapshotAt(fetchedAt: number, projectId = PROJECT): TaskSnapshot {
  return {
    projectId,
    tasks: buildTaskTree([
      { task_designator: 'A', name: 'Task A', status: 'pending', requirements: [], notes: [], updated_at: 1 }
    ]),
    fetchedAt,
    version: 0
  };
}

describe('SessionStore', () => {
  describe('refresh slot', () => {
    it('starts with an empty, stale snapshot', () => {
      const { store } = makeStore();
      expect(store.getSnapshot().version).toBe(0);
      expect(store.getSnapshot().fetchedAt).toBeNull();
      expect(store.isStale()).toBe(true);
    });

    it('grants the slot to one refresh at a time', () => {
      const { store } = makeStore();
      expect(store.beginRefresh()).toBe(true);
      expect(store.beginRefresh()).toBe(false);
      expect(store.getSyncState().inFlight).toBe(true);
    });

    it('publishes a snapshot and records the sync', () => {
      const { store, events } = makeStore();
      store.beginRefresh();
      expect(store.publish(snapshotAt(T0))).toBe(true);
      store.endRefresh({ ok: true, snapshot: store.getSnapshot() });

      expect(store.getSnapshot().version).toBe(1);
      expect(store.getSyncState()).toMatchObject({ syncedAt: T0, consecutiveFailures: 0, inFlight: false });
      expect(store.isStale()).toBe(false);
      expect(events.map((e) => e.type)).toEqual(['sync.started', 'sync.succeeded']);
    });

    it('ignores a publish outside a refresh', () => {
      const { store } = makeStore();
      expect(store.publish(snapshotAt(T0))).toBe(false);
      expect(store.getSnapshot().version).toBe(0);
    });

    it('never moves freshness backwards', () => {
      const { store } = makeStore();
      store.beginRefresh();
      store.publish(snapshotAt(T0));
      expect(store.publish(snapshotAt(T0 - 1))).toBe(false);
      expect(store.getSnapshot().fetchedAt).toBe(T0);
      expect(store.getSnapshot().version).toBe(1);
    });

    it('rejects a snapshot for another project', () => {
      const { store } = makeStore();
      store.beginRefresh();
      expect(store.publish(snapshotAt(T0, 'OTHER'))).toBe(false);
    });

    it('treats endRefresh without beginRefresh as a no-op', () => {
      const { store, events } = makeStore();
      store.endRefresh({ ok: false, error: new NetworkError('down') });
      expect(store.getSyncState().consecutiveFailures).toBe(0);
      expect(events).toEqual([]);
    });

    it('counts consecutive failures and keeps the last error', () => {
      const { store, clock } = makeStore();
      for (let i = 0; i < 2; i += 1) {
        store.beginRefresh();
        store.endRefresh({ ok: false, error: new NetworkError('down') });
      }
      expect(store.getSyncState()).toMatchObject({
        consecutiveFailures: 2,
        inFlight: false,
        lastError: { code: 'NETWORK_ERROR', message: 'down', retryable: true, at: clock.t }
      });

      store.beginRefresh();
      store.publish(snapshotAt(T0));
      store.endRefresh({ ok: true, snapshot: store.getSnapshot() });
      expect(store.getSyncState().consecutiveFailures).toBe(0);
      expect(store.getSyncState().lastError).toBeUndefined();
    });

    it('becomes stale once staleAfterMs passes without a sync', () => {
      const { store, clock } = makeStore();
      store.beginRefresh();
      store.publish(snapshotAt(T0));
      store.endRefresh({ ok: true, snapshot: store.getSnapshot() });

      clock.advance(60_000);
      expect(store.isStale()).toBe(false);
      clock.advance(1);
      expect(store.isStale()).toBe(true);
      expect(store.freshness()).toMatchObject({
        syncedAt: new Date(T0).toISOString(),
        stale: true,
        staleAfterMs: 60_000,
        snapshotVersion: 1
      });
    });

    it('hands out snapshots readers cannot mutate', () => {
      const { store } = makeStore();
      store.beginRefresh();
      store.publish(snapshotAt(T0));
      const snapshot = store.getSnapshot();
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.tasks[0])).toBe(true);
    });
  });

  describe('credential', () => {
    it('invalidates once and emits one event', () => {
      const { store, events } = makeStore();
      store.invalidateCredential('backend rejected credential (401)');
      store.invalidateCredential('again');

      expect(store.isAuthenticated()).toBe(false);
      expect(store.getSession().invalidReason).toBe('backend rejected credential (401)');
      expect(events.filter((e) => e.type === 'auth.invalidated')).toHaveLength(1);
    });

    it('replaces the token and restores the session', () => {
      const { store, events } = makeStore();
      store.invalidateCredential('expired');

      expect(store.replaceCredential(TOKEN)).toBe(false);
      expect(store.replaceCredential('test-secret-2')).toBe(true);
      expect(store.isAuthenticated()).toBe(true);
      expect(store.getSession().token).toBe('test-secret-2');
      expect(store.getSession().invalidReason).toBeUndefined();
      expect(events.map((e) => e.type)).toEqual(['auth.invalidated', 'auth.restored']);
    });

    it('records the account on successful verification', () => {
      const { store } = makeStore();
      store.markAuthenticated({ email: 'agent@example.com', apiVersion: '1.2.0' });
      expect(store.status().auth).toEqual({
        valid: true,
        account: { email: 'agent@example.com', apiVersion: '1.2.0' }
      });
    });

    it('keeps working when the event listener throws', () => {
      const { store } = makeStore();
      store.setEventListener(() => {
        throw new Error('listener broke');
      });
      expect(() => store.invalidateCredential('expired')).not.toThrow();
      expect(store.isAuthenticated()).toBe(false);
    });
  });

  describe('status', () => {
    it('reports counts, freshness and auth', () => {
      const { store } = makeStore();
      store.beginRefresh();
      store.publish(snapshotAt(T0));
      store.endRefresh({ ok: true, snapshot: store.getSnapshot() });

      expect(store.status()).toEqual({
        projectId: PROJECT,
        agentName: 'tester',
        auth: { valid: true },
        sync: {
          syncedAt: new Date(T0).toISOString(),
          stale: false,
          staleAfterMs: 60_000,
          consecutiveFailures: 0,
          inFlight: false
        },
        snapshotVersion: 1,
        taskCount: 1,
        counts: { pending: 1, in_progress: 0, blocked: 0, done: 0 }
      });
    });
  });
});
