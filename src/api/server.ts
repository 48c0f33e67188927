import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import websocket from '@fastify/websocket';
import type { Logger } from 'pino';
import type WebSocket from 'ws';

import { createApiKeyHook } from '../core/auth.js';
import type { BridgeConfig } from '../core/config.js';
import type { SessionStore } from '../core/store.js';
import type { StatusSynchronizer } from '../core/synchronizer.js';
import type { BridgeEvent } from '../core/types.js';
import { registerRoutes } from './routes.js';

/** Last `capacity` store events, kept for `/api/events`. */
export class EventRing {
  private readonly slots: (BridgeEvent | undefined)[];
  private next = 0;
  private count = 0;

  constructor(private readonly capacity: number) {
    this.slots = new Array<BridgeEvent | undefined>(capacity);
  }

  push(evt: BridgeEvent): void {
    this.slots[this.next] = evt;
    this.next = (this.next + 1) % this.capacity;
    this.count = Math.min(this.count + 1, this.capacity);
  }

  /** Newest `limit` events, oldest first. */
  recent(limit: number): BridgeEvent[] {
    const take = Math.min(limit, this.count);
    const out: BridgeEvent[] = [];
    for (let i = take; i > 0; i -= 1) {
      const evt = this.slots[(this.next - i + this.capacity) % this.capacity];
      if (evt) out.push(evt);
    }
    return out;
  }

  get size(): number {
    return this.count;
  }
}

export type StatusServerConfig = Pick<BridgeConfig, 'TASKLINK_STATUS_API_KEYS' | 'TASKLINK_RATE_LIMIT_RPM'>;

export interface StatusServerDeps {
  store: SessionStore;
  synchronizer: Pick<StatusSynchronizer, 'refreshNow'>;
  log: Logger;
}

/**
 * Read-only status API for operators, plus a websocket feed of store
 * events. Takes over the store's event listener until closed.
 */
export async function createStatusServer(cfg: StatusServerConfig, deps: StatusServerDeps): Promise<FastifyInstance> {
  const { store, synchronizer, log } = deps;
  // Fastify's own logger writes to stdout, which the MCP transport owns.
  const app = Fastify({ logger: false });

  const wsClients = new Set<WebSocket>();
  const events = new EventRing(500);

  function broadcast(evt: BridgeEvent) {
    events.push(evt);
    for (const client of wsClients) {
      if (client.readyState === 1) {
        client.send(JSON.stringify(evt));
      }
    }
  }

  await app.register(helmet, { global: true });
  await app.register(rateLimit, { max: cfg.TASKLINK_RATE_LIMIT_RPM, timeWindow: '1 minute' });
  await app.register(websocket);

  app.addHook('onRequest', createApiKeyHook(cfg.TASKLINK_STATUS_API_KEYS));
  app.addHook('onResponse', async (req, reply) => {
    log.debug({ method: req.method, url: req.url, statusCode: reply.statusCode }, 'status api request');
  });

  store.setEventListener(broadcast);

  await registerRoutes(app, { store, synchronizer, events });

  app.get('/ws', { websocket: true }, (socket) => {
    wsClients.add(socket);
    socket.send(JSON.stringify({ type: 'tasklink.hello', ts: Date.now() }));

    socket.on('close', () => {
      wsClients.delete(socket);
    });
  });

  app.addHook('onClose', async () => {
    store.setEventListener(null);
    for (const client of wsClients) client.close();
    wsClients.clear();
  });

  return app;
}
