import type { Logger } from 'pino';
import type { BridgeConfig } from './core/config.js';
import { ProtocolDispatcher } from './core/dispatcher.js';
import { toBridgeError } from './core/errors.js';
import { createDefaultRegistry, type ToolRegistry } from './core/registry.js';
import { SessionStore } from './core/store.js';
import { StatusSynchronizer } from './core/synchronizer.js';
import { BackendGateway } from './infra/gateway.js';

export interface BridgeDeps {
  log: Logger;
  fetch?: typeof fetch;
  now?: () => number;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface Bridge {
  store: SessionStore;
  gateway: BackendGateway;
  synchronizer: StatusSynchronizer;
  registry: ToolRegistry;
  dispatcher: ProtocolDispatcher;
  /** Verify the credential (failure is logged, not fatal) and start syncing. */
  start(): Promise<void>;
  /** Disarm the sync loop, drain tool calls within the grace period, then stop syncing. */
  stop(): Promise<void>;
}

/**
 * Wire up the bridge components for one project session. No I/O happens
 * until `start()`.
 */
export function createBridge(cfg: BridgeConfig, deps: BridgeDeps): Bridge {
  const { log } = deps;

  const store = new SessionStore(
    {
      projectId: cfg.TASKLINK_PROJECT_ID,
      baseUrl: cfg.TASKLINK_API_URL,
      token: cfg.TASKLINK_API_TOKEN,
      agentName: cfg.TASKLINK_AGENT_NAME
    },
    log.child({ component: 'store' }),
    { staleAfterMs: cfg.TASKLINK_STALE_AFTER_MS, now: deps.now }
  );

  const gateway = new BackendGateway(store, log.child({ component: 'gateway' }), {
    timeoutMs: cfg.TASKLINK_REQUEST_TIMEOUT_MS,
    retryAttempts: cfg.TASKLINK_RETRY_ATTEMPTS,
    retryBaseMs: cfg.TASKLINK_RETRY_BASE_MS,
    fetch: deps.fetch,
    now: deps.now,
    random: deps.random,
    sleep: deps.sleep
  });

  const synchronizer = new StatusSynchronizer(store, gateway, log.child({ component: 'sync' }), {
    intervalMs: cfg.TASKLINK_SYNC_INTERVAL_MS,
    maxIntervalMs: cfg.TASKLINK_SYNC_MAX_INTERVAL_MS
  });

  const registry = createDefaultRegistry();
  const dispatcher = new ProtocolDispatcher(
    registry,
    { store, gateway, synchronizer, log },
    log.child({ component: 'dispatcher' })
  );

  return {
    store,
    gateway,
    synchronizer,
    registry,
    dispatcher,

    async start() {
      try {
        const { account, latencyMs } = await gateway.authenticate();
        log.info({ email: account.email, apiVersion: account.apiVersion, latencyMs }, 'backend credential verified');
      } catch (err) {
        const error = toBridgeError(err);
        log.warn({ code: error.code, reason: error.message }, 'credential check failed at startup');
      }
      synchronizer.start();
    },

    async stop() {
      synchronizer.halt();
      await dispatcher.close(cfg.TASKLINK_SHUTDOWN_GRACE_MS);
      await synchronizer.stop();
    }
  };
}
