import type { Logger } from 'pino';
import { CancelledError, StateError, toBridgeError } from './errors.js';
import type { RefreshResult, SessionStore } from './store.js';
import type { ProjectId, TaskSnapshot } from './types.js';

export interface SnapshotSource {
  fetchProjectState(projectId: ProjectId): Promise<TaskSnapshot>;
}

export interface SynchronizerOptions {
  intervalMs: number;
  maxIntervalMs: number;
}

/**
 * Delay before the next scheduled sync: the base interval doubled per
 * consecutive failure, capped at `maxIntervalMs`.
 */
export function computeSyncDelay(failures: number, intervalMs: number, maxIntervalMs: number): number {
  if (failures <= 0) return intervalMs;
  return Math.min(intervalMs * 2 ** failures, maxIntervalMs);
}

interface RunningRefresh {
  id: number;
  promise: Promise<RefreshResult>;
}

/**
 * Keeps the published snapshot fresh.
 *
 * A timer loop pulls project state and publishes it through the store's
 * refresh slot; tool handlers use `refreshNow` (reconcile after a write) and
 * `requestRefresh` (stale read). Only one refresh runs at a time because all
 * of them go through `SessionStore.beginRefresh`.
 */
export class StatusSynchronizer {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private stopped = false;
  private halted = false;
  private current: RunningRefresh | null = null;
  private startedCount = 0;

  constructor(
    private readonly store: SessionStore,
    private readonly source: SnapshotSource,
    private readonly log: Logger,
    private readonly opts: SynchronizerOptions
  ) {}

  /** Start the loop with an immediate first sync. */
  start(): void {
    if (this.running || this.stopped || this.halted) return;
    this.running = true;
    this.schedule(0);
    this.log.info({ intervalMs: this.opts.intervalMs }, 'status synchronizer started');
  }

  get isRunning(): boolean {
    return this.running;
  }

  nextDelay(): number {
    return computeSyncDelay(
      this.store.getSyncState().consecutiveFailures,
      this.opts.intervalMs,
      this.opts.maxIntervalMs
    );
  }

  /** Re-arm the timer so the next tick happens now. */
  wake(): void {
    if (this.running) this.schedule(0);
  }

  /**
   * One loop iteration. A tick that cannot claim the refresh slot is skipped
   * without side effects.
   */
  async tick(): Promise<void> {
    if (!this.running) return;
    const pending = this.tryRefresh('interval');
    if (pending) {
      await pending;
    } else {
      this.log.debug('sync tick skipped; refresh already in flight');
    }
    this.schedule(this.nextDelay());
  }

  /**
   * Refresh that is guaranteed to start after this call. An in-flight refresh
   * that began earlier is waited out first, since it may not include writes
   * made just before the call.
   */
  async refreshNow(reason: string): Promise<RefreshResult> {
    const after = this.startedCount;
    for (;;) {
      if (this.stopped) return { ok: false, error: new CancelledError('Synchronizer is stopped') };
      const current = this.current;
      if (current === null) break;
      if (current.id > after) return current.promise;
      await current.promise;
    }

    const started = this.tryRefresh(reason);
    if (started) return started;

    const error = new StateError('Refresh slot is held outside the synchronizer');
    this.log.error({ err: error, reason }, 'on-demand refresh could not start');
    return { ok: false, error };
  }

  /**
   * Start a background refresh unless one is already running. Never waits.
   * Returns whether a refresh was started.
   */
  requestRefresh(reason: string): boolean {
    if (this.halted) return false;
    const pending = this.tryRefresh(reason);
    if (!pending) return false;
    pending.then(
      (result) => this.log.debug({ reason, ok: result.ok }, 'background refresh finished'),
      (err: unknown) => this.log.error({ err, reason }, 'background refresh crashed')
    );
    return true;
  }

  /**
   * Disarm the timer loop and background refreshes. `refreshNow` keeps
   * working so writes still in flight at shutdown can reconcile.
   */
  halt(): void {
    this.halted = true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /**
   * Stop the loop. No backend call starts after this; a refresh already in
   * flight is allowed to finish and is awaited.
   */
  async stop(): Promise<void> {
    this.halt();
    this.stopped = true;
    const current = this.current;
    if (current) await current.promise;
    this.log.info('status synchronizer stopped');
  }

  private schedule(delayMs: number): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((err: unknown) => this.log.error({ err }, 'sync tick failed'));
    }, delayMs);
    this.timer.unref();
  }

  private tryRefresh(reason: string): Promise<RefreshResult> | null {
    if (this.stopped) return null;
    if (!this.store.beginRefresh()) return null;
    const id = ++this.startedCount;
    const promise = this.run(id, reason);
    this.current = { id, promise };
    return promise;
  }

  private async run(id: number, reason: string): Promise<RefreshResult> {
    const { projectId } = this.store.getSession();
    let result: RefreshResult;
    try {
      const snapshot = await this.source.fetchProjectState(projectId);
      this.store.publish(snapshot);
      result = { ok: true, snapshot: this.store.getSnapshot() };
      this.log.debug({ reason, tasks: snapshot.tasks.length }, 'project state refreshed');
    } catch (err) {
      const error = toBridgeError(err);
      result = { ok: false, error };
      this.log.warn({ reason, code: error.code, err: error.message }, 'project state refresh failed');
    }
    this.store.endRefresh(result);
    if (this.current?.id === id) this.current = null;
    return result;
  }
}
