/**
 * Error taxonomy shared by every collaborator and the orchestrator
 */

export type RefreshErrorKind =
  | 'connection'
  | 'not_found'
  | 'state_transition'
  | 'replication'
  | 'remote_execution'
  | 'timeout'
  | 'cancelled'
  | 'invalid_request';

export abstract class RefreshError extends Error {
  abstract readonly kind: RefreshErrorKind;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

// Array or database endpoint unreachable or refusing our credentials
export class ConnectionError extends RefreshError {
  readonly kind = 'connection' as const;
}

// Zero or ambiguous results from a database, disk or volume lookup
export class NotFoundError extends RefreshError {
  readonly kind = 'not_found' as const;
}

export class StateTransitionError extends RefreshError {
  readonly kind = 'state_transition' as const;
}

export class ReplicationError extends RefreshError {
  readonly kind = 'replication' as const;
}

export type RemoteFailureReason = 'connectivity' | 'authorization' | 'remote' | 'protocol';

export class RemoteExecutionError extends RefreshError {
  readonly kind = 'remote_execution' as const;
  readonly reason: RemoteFailureReason;
  readonly hostName: string;

  constructor(message: string, hostName: string, reason: RemoteFailureReason, cause?: unknown) {
    super(message, cause);
    this.hostName = hostName;
    this.reason = reason;
  }
}

export class TimeoutError extends RefreshError {
  readonly kind = 'timeout' as const;
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends RefreshError {
  readonly kind = 'cancelled' as const;
}

export class InvalidRequestError extends RefreshError {
  readonly kind = 'invalid_request' as const;
}

/**
 * Result of a call across a collaborator boundary. Collaborators return these
 * instead of throwing; the orchestrator decides what a failure means.
 */
export type Outcome<T, E extends RefreshError = RefreshError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function fail<E extends RefreshError>(error: E): Outcome<never, E> {
  return { ok: false, error };
}

export function describeCause(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
