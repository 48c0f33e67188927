export type TaskId = string;
export type ProjectId = string;
export type RequirementId = string;

export const TASK_STATUSES = ['pending', 'in_progress', 'blocked', 'done'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  id: TaskId;
  title: string;
  description?: string;
  status: TaskStatus;
  parentId?: TaskId;
  childIds: TaskId[];
  requirements: RequirementId[];
  notes: string[];
  /** Last-modified time on the backend, ms since epoch. */
  updatedAt: number;
}

/**
 * Immutable copy of the project's task list as last observed from the
 * backend. Replaced wholesale on every successful sync.
 */
export interface TaskSnapshot {
  readonly projectId: ProjectId;
  readonly tasks: readonly Readonly<Task>[];
  /** When the backend answered; null only for the empty snapshot before the first sync. */
  readonly fetchedAt: number | null;
  /** Increases by one on every publish. */
  readonly version: number;
}

export interface TaskPatch {
  status?: TaskStatus;
  title?: string;
  /** Optimistic concurrency token: the `updatedAt` the caller last saw. */
  expectedUpdatedAt?: number;
}

export interface SyncErrorInfo {
  code: string;
  message: string;
  retryable: boolean;
  at: number;
}

export interface SyncState {
  /** Freshness timestamp: time of the last successful sync. */
  syncedAt: number | null;
  consecutiveFailures: number;
  lastError?: SyncErrorInfo;
  inFlight: boolean;
  lastAttemptAt?: number;
}

export interface AccountInfo {
  email: string;
  apiVersion: string;
}

export interface ProjectSession {
  projectId: ProjectId;
  baseUrl: string;
  token: string;
  agentName: string;
  credentialValid: boolean;
  invalidReason?: string;
  account?: AccountInfo;
}

export interface Project {
  id: ProjectId;
  name: string;
  description?: string;
}

export type RequirementStatus = 'approved' | 'pending_review' | 'draft' | 'rejected';

export interface Requirement {
  id: RequirementId;
  name: string;
  description: string;
  status: RequirementStatus;
  notes: string[];
}

export interface NoteReceipt {
  targetId: string;
  noteId?: string;
  createdAt?: string;
}

export interface AuthResult {
  account: AccountInfo;
  latencyMs: number;
}

export type TaskCounts = Record<TaskStatus, number>;

export interface StatusReport {
  projectId: ProjectId;
  agentName: string;
  auth: {
    valid: boolean;
    reason?: string;
    account?: AccountInfo;
  };
  sync: {
    syncedAt: string | null;
    stale: boolean;
    staleAfterMs: number;
    consecutiveFailures: number;
    lastError?: SyncErrorInfo;
    inFlight: boolean;
  };
  snapshotVersion: number;
  taskCount: number;
  counts: TaskCounts;
}

export type BridgeEvent =
  | { type: 'sync.started'; ts: number }
  | { type: 'sync.succeeded'; taskCount: number; version: number; ts: number }
  | { type: 'sync.failed'; code: string; message: string; consecutiveFailures: number; ts: number }
  | { type: 'auth.invalidated'; reason: string; ts: number }
  | { type: 'auth.restored'; ts: number };
