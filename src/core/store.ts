import type { Logger } from 'pino';
import { StateError, type BridgeError } from './errors.js';
import { countByStatus, emptySnapshot, freezeSnapshot } from './mappers.js';
import type {
  AccountInfo,
  BridgeEvent,
  ProjectSession,
  StatusReport,
  SyncErrorInfo,
  SyncState,
  TaskSnapshot
} from './types.js';

export type RefreshResult =
  | { ok: true; snapshot: TaskSnapshot }
  | { ok: false; error: BridgeError };

export interface Freshness {
  syncedAt: string | null;
  stale: boolean;
  staleAfterMs: number;
  consecutiveFailures: number;
  lastError?: SyncErrorInfo;
  snapshotVersion: number;
}

export interface SessionStoreOptions {
  staleAfterMs: number;
  now?: () => number;
}

export type SessionInit = Omit<ProjectSession, 'credentialValid' | 'invalidReason' | 'account'>;

/**
 * Sole owner of the project session, the published task snapshot and the
 * sync state.
 *
 * Readers get immutable values and never wait. Writes go through a narrow
 * API: `beginRefresh`/`publish`/`endRefresh` for the snapshot and
 * `invalidateCredential`/`replaceCredential`/`markAuthenticated` for the
 * credential.
 */
export class SessionStore {
  private session: Readonly<ProjectSession>;
  private snapshot: TaskSnapshot;
  private sync: Readonly<SyncState> = Object.freeze({
    syncedAt: null,
    consecutiveFailures: 0,
    inFlight: false
  });
  private listener: ((evt: BridgeEvent) => void) | null = null;
  private readonly now: () => number;
  readonly staleAfterMs: number;

  constructor(init: SessionInit, private readonly log: Logger, opts: SessionStoreOptions) {
    this.session = Object.freeze({ ...init, credentialValid: true });
    this.snapshot = emptySnapshot(init.projectId);
    this.now = opts.now ?? Date.now;
    this.staleAfterMs = opts.staleAfterMs;
  }

  setEventListener(listener: ((evt: BridgeEvent) => void) | null): void {
    this.listener = listener;
  }

  private emit(evt: BridgeEvent): void {
    if (!this.listener) return;
    try {
      this.listener(evt);
    } catch (err) {
      this.log.error({ err, type: evt.type }, 'event listener threw');
    }
  }

  private violation(message: string): void {
    const err = new StateError(message);
    this.log.error({ err }, 'session store invariant violated; ignoring');
  }

  // ==================== SNAPSHOT / SYNC ====================

  getSnapshot(): TaskSnapshot {
    return this.snapshot;
  }

  getSyncState(): Readonly<SyncState> {
    return this.sync;
  }

  /**
   * Claim the single refresh slot. Returns false when a refresh is already in
   * flight; the caller must then skip its refresh.
   */
  beginRefresh(): boolean {
    if (this.sync.inFlight) return false;
    const ts = this.now();
    this.sync = Object.freeze({ ...this.sync, inFlight: true, lastAttemptAt: ts });
    this.emit({ type: 'sync.started', ts });
    return true;
  }

  /**
   * Swap in a new snapshot. Only accepted from the refresh that holds the
   * slot, and never older than the current one.
   */
  publish(next: TaskSnapshot): boolean {
    if (!this.sync.inFlight) {
      this.violation('publish called without an in-flight refresh');
      return false;
    }
    if (next.projectId !== this.snapshot.projectId) {
      this.violation(`publish for project ${next.projectId} in session ${this.snapshot.projectId}`);
      return false;
    }
    const current = this.snapshot.fetchedAt;
    if (next.fetchedAt === null || (current !== null && next.fetchedAt < current)) {
      this.violation('publish would move freshness backwards');
      return false;
    }

    this.snapshot = freezeSnapshot({
      projectId: next.projectId,
      tasks: next.tasks,
      fetchedAt: next.fetchedAt,
      version: this.snapshot.version + 1
    });
    return true;
  }

  /** Release the refresh slot and record the outcome. */
  endRefresh(result: RefreshResult): void {
    if (!this.sync.inFlight) {
      this.violation('endRefresh called without beginRefresh');
      return;
    }
    const ts = this.now();

    if (result.ok) {
      this.sync = Object.freeze({
        syncedAt: this.snapshot.fetchedAt,
        consecutiveFailures: 0,
        inFlight: false,
        lastAttemptAt: this.sync.lastAttemptAt
      });
      this.emit({
        type: 'sync.succeeded',
        taskCount: this.snapshot.tasks.length,
        version: this.snapshot.version,
        ts
      });
      return;
    }

    const { error } = result;
    this.sync = Object.freeze({
      ...this.sync,
      consecutiveFailures: this.sync.consecutiveFailures + 1,
      lastError: Object.freeze({
        code: error.code,
        message: error.message,
        retryable: error.retryable,
        at: ts
      }),
      inFlight: false
    });
    this.emit({
      type: 'sync.failed',
      code: error.code,
      message: error.message,
      consecutiveFailures: this.sync.consecutiveFailures,
      ts
    });
  }

  isStale(): boolean {
    const { syncedAt } = this.sync;
    return syncedAt === null || this.now() - syncedAt > this.staleAfterMs;
  }

  freshness(): Freshness {
    const { syncedAt, consecutiveFailures, lastError } = this.sync;
    return {
      syncedAt: syncedAt === null ? null : new Date(syncedAt).toISOString(),
      stale: this.isStale(),
      staleAfterMs: this.staleAfterMs,
      consecutiveFailures,
      lastError,
      snapshotVersion: this.snapshot.version
    };
  }

  // ==================== CREDENTIAL ====================

  getSession(): Readonly<ProjectSession> {
    return this.session;
  }

  isAuthenticated(): boolean {
    return this.session.credentialValid;
  }

  /** Mark the credential unusable until it is replaced externally. */
  invalidateCredential(reason: string): void {
    if (!this.session.credentialValid) return;
    this.session = Object.freeze({ ...this.session, credentialValid: false, invalidReason: reason });
    this.log.warn({ reason }, 'backend credential invalidated');
    this.emit({ type: 'auth.invalidated', reason, ts: this.now() });
  }

  /**
   * Install a credential obtained outside the bridge. Returns false when the
   * token is unchanged.
   */
  replaceCredential(token: string): boolean {
    if (token === this.session.token) return false;
    const wasInvalid = !this.session.credentialValid;
    this.session = Object.freeze({
      projectId: this.session.projectId,
      baseUrl: this.session.baseUrl,
      agentName: this.session.agentName,
      token,
      credentialValid: true
    });
    this.log.info('backend credential replaced');
    if (wasInvalid) this.emit({ type: 'auth.restored', ts: this.now() });
    return true;
  }

  /** Record a successful verification of the current token. */
  markAuthenticated(account: AccountInfo): void {
    const wasInvalid = !this.session.credentialValid;
    this.session = Object.freeze({
      ...this.session,
      credentialValid: true,
      invalidReason: undefined,
      account: Object.freeze({ ...account })
    });
    if (wasInvalid) this.emit({ type: 'auth.restored', ts: this.now() });
  }

  // ==================== OBSERVABILITY ====================

  status(): StatusReport {
    const { session, snapshot, sync } = this;
    return {
      projectId: session.projectId,
      agentName: session.agentName,
      auth: {
        valid: session.credentialValid,
        reason: session.invalidReason,
        account: session.account
      },
      sync: {
        syncedAt: sync.syncedAt === null ? null : new Date(sync.syncedAt).toISOString(),
        stale: this.isStale(),
        staleAfterMs: this.staleAfterMs,
        consecutiveFailures: sync.consecutiveFailures,
        lastError: sync.lastError,
        inFlight: sync.inFlight
      },
      snapshotVersion: snapshot.version,
      taskCount: snapshot.tasks.length,
      counts: countByStatus(snapshot.tasks)
    };
  }
}
