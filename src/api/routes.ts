import type { FastifyInstance } from 'fastify';
import type { SessionStore } from '../core/store.js';
import type { StatusSynchronizer } from '../core/synchronizer.js';
import type { BridgeEvent } from '../core/types.js';
import { EventsQuery } from './schemas.js';

function ok<T>(data: T) {
  return { ok: true as const, data };
}

function bad(message: string) {
  return { ok: false as const, error: message };
}

export interface EventSource {
  recent(limit: number): BridgeEvent[];
}

export interface StatusRouteDeps {
  store: SessionStore;
  synchronizer: Pick<StatusSynchronizer, 'refreshNow'>;
  events: EventSource;
}

export async function registerRoutes(app: FastifyInstance, deps: StatusRouteDeps) {
  const { store, synchronizer, events } = deps;

  app.get('/api/status', async () => ok(store.status()));

  app.get('/api/tasks', async () => ok(store.getSnapshot()));

  app.post('/api/sync', async (_req, reply) => {
    const result = await synchronizer.refreshNow('status-api');
    const sync = store.freshness();
    if (result.ok) {
      return ok({ outcome: { ok: true, snapshotVersion: result.snapshot.version }, sync });
    }
    const { code, message, retryable } = result.error;
    return reply.status(502).send({
      ...bad(message),
      data: { outcome: { ok: false, code, message, retryable }, sync }
    });
  });

  app.get('/api/events', async (req, reply) => {
    const parsed = EventsQuery.safeParse(req.query);
    if (!parsed.success) return reply.status(400).send(bad(parsed.error.message));
    return ok(events.recent(parsed.data.limit ?? 100));
  });
}
