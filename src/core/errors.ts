/**
 * Error taxonomy for the tasklink bridge.
 *
 * All errors extend {@link BridgeError} which provides:
 * - A machine-readable `code` for programmatic handling
 * - An HTTP-compatible `statusCode` for the status API
 * - A `category` telling the agent what kind of reaction the failure needs
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { ConflictError, toBridgeError } from './errors.js';
 *
 * try {
 *   await gateway.submitTaskUpdate('T-1', { status: 'done' });
 * } catch (err) {
 *   const e = toBridgeError(err);
 *   if (e.retryable) scheduleRetry();
 * }
 * ```
 */

/**
 * How a failure should be handled by whoever receives it.
 *
 * - `transient`: may succeed if retried later
 * - `business`: the request itself is wrong or collided with other edits; needs a decision
 * - `operator`: configuration or credentials; needs a human
 * - `internal`: invariant violation inside the bridge
 */
export type ErrorCategory = 'transient' | 'business' | 'operator' | 'internal';

/**
 * Base error class for all bridge errors.
 *
 * @example
 * ```typescript
 * try {
 *   throw new BridgeError('Something went wrong', 'INTERNAL_ERROR', 500, 'internal');
 * } catch (err) {
 *   if (err instanceof BridgeError) {
 *     console.log(err.code);      // 'INTERNAL_ERROR'
 *     console.log(err.retryable); // false
 *   }
 * }
 * ```
 */
export class BridgeError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Machine-readable error code
   * @param statusCode - HTTP status code (default: 500)
   * @param category - Handling class (default: 'internal')
   */
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly category: ErrorCategory = 'internal'
  ) {
    super(message);
    this.name = 'BridgeError';
  }

  /** True when the same call may succeed if repeated later. */
  get retryable(): boolean {
    return this.category === 'transient';
  }
}

/**
 * The backend rejected the credential (HTTP 401/403), or the session was
 * already invalidated by an earlier rejection.
 *
 * Not retried. Every later backend call fails fast with this error until the
 * credential is replaced externally.
 *
 * @statusCode 401
 */
export class AuthError extends BridgeError {
  constructor(message: string = 'Backend credential is invalid or expired') {
    super(message, 'AUTH_REQUIRED', 401, 'operator');
    this.name = 'AuthError';
  }
}

/**
 * The backend could not be reached, or the request timed out.
 *
 * @statusCode 503
 */
export class NetworkError extends BridgeError {
  constructor(message: string) {
    super(message, 'NETWORK_ERROR', 503, 'transient');
    this.name = 'NetworkError';
  }
}

/**
 * The backend answered with an error status, or with a body that could not be
 * decoded.
 *
 * 5xx responses are transient; everything else is a business error that is
 * surfaced to the agent unchanged.
 *
 * @example
 * ```typescript
 * throw new BackendError(422, '{"message":"status is read-only"}');
 * ```
 */
export class BackendError extends BridgeError {
  /**
   * @param status - HTTP status returned by the backend
   * @param body - Raw response body (clipped by the gateway)
   * @param message - Override for the default message
   */
  constructor(
    public readonly status: number,
    public readonly body: string,
    message?: string
  ) {
    super(
      message ?? `Backend responded with ${status}${body ? `: ${body}` : ''}`,
      'BACKEND_ERROR',
      status,
      status >= 500 ? 'transient' : 'business'
    );
    this.name = 'BackendError';
  }
}

/**
 * A write collided with newer backend state.
 *
 * Never resolved automatically: the agent receives the conflict and decides
 * whether to re-read and re-apply.
 *
 * @statusCode 409
 */
export class ConflictError extends BridgeError {
  constructor(
    message: string,
    public readonly taskId?: string
  ) {
    super(message, 'CONFLICT', 409, 'business');
    this.name = 'ConflictError';
  }
}

/**
 * Tool arguments (or other input) failed validation. Raised before any
 * backend call is made.
 *
 * @statusCode 400
 */
export class ValidationError extends BridgeError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'VALIDATION_ERROR', 400, 'business');
    this.name = 'ValidationError';
  }
}

/**
 * A tool, resource or task does not exist.
 *
 * @statusCode 404
 */
export class NotFoundError extends BridgeError {
  /**
   * @param resource - Kind of thing looked up (e.g. 'Task', 'Tool')
   * @param id - The identifier that was not found
   */
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404, 'business');
    this.name = 'NotFoundError';
  }
}

/**
 * Internal invariant violation, e.g. a publish outside a refresh. Logged and
 * treated as a no-op by the session store.
 */
export class StateError extends BridgeError {
  constructor(message: string) {
    super(message, 'STATE_ERROR', 500, 'internal');
    this.name = 'StateError';
  }
}

/**
 * The call was abandoned because the server is shutting down.
 *
 * @statusCode 499
 */
export class CancelledError extends BridgeError {
  constructor(message: string = 'Server is shutting down; the call was cancelled') {
    super(message, 'CANCELLED', 499, 'transient');
    this.name = 'CancelledError';
  }
}

/**
 * Configuration is missing or invalid.
 */
export class ConfigurationError extends BridgeError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500, 'operator');
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize any thrown value into a {@link BridgeError}. Unknown values keep
 * their message and become `internal`.
 */
export function toBridgeError(err: unknown): BridgeError {
  if (err instanceof BridgeError) return err;
  if (err instanceof Error) return new BridgeError(err.message, 'INTERNAL_ERROR');
  return new BridgeError(String(err), 'INTERNAL_ERROR');
}
