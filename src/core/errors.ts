import type { ReservationWithAgent } from '../types.js';

/**
 * Error hierarchy for coordination operations.
 *
 * Every error carries a machine-readable `code` so callers (CLI, RPC layers)
 * can branch without parsing messages:
 * - ValidationError: malformed input, raised before any write
 * - NotFoundError / UnknownAgentError: id or name does not resolve
 * - ConflictError: overlapping reservation, duplicate key, illegal transition
 * - PolicyDeniedError: contact policy, blocked link, inactive agent
 * - PermissionError: record exists but does not belong to the caller
 */
export class SwitchboardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SwitchboardError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ValidationError extends SwitchboardError {
  constructor(message: string, code = 'INVALID_INPUT', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends SwitchboardError {
  constructor(message: string, code = 'NOT_FOUND', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'NotFoundError';
  }
}

export class UnknownAgentError extends NotFoundError {
  constructor(ref: string) {
    super(`Agent not found: ${ref}`, 'UNKNOWN_AGENT', { agent: ref });
    this.name = 'UnknownAgentError';
  }
}

export class ConflictError extends SwitchboardError {
  constructor(message: string, code = 'CONFLICT', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'ConflictError';
  }
}

/**
 * Raised when a reservation request overlaps active claims of other agents.
 * `conflicts` lists every overlapping reservation, not only the first.
 */
export class ReservationConflictError extends ConflictError {
  constructor(
    public readonly pathPattern: string,
    public readonly conflicts: ReservationWithAgent[]
  ) {
    const holders = [...new Set(conflicts.map(c => c.agent_name))].join(', ');
    super(`Reservation on ${pathPattern} conflicts with ${holders}`, 'RESERVATION_CONFLICT', {
      path_pattern: pathPattern,
      conflicts: conflicts.map(c => ({
        id: c.id,
        agent: c.agent_name,
        path_pattern: c.path_pattern,
        exclusive: c.exclusive,
        expires_ts: c.expires_ts,
      })),
    });
    this.name = 'ReservationConflictError';
  }
}

export class AlreadyReleasedError extends ConflictError {
  constructor(reservationId: number, releasedTs: string) {
    super(`Reservation ${reservationId} already released`, 'ALREADY_RELEASED', {
      reservation_id: reservationId,
      released_ts: releasedTs,
    });
    this.name = 'AlreadyReleasedError';
  }
}

export class LinkBlockedError extends ConflictError {
  constructor(linkId: number) {
    super(`Contact link ${linkId} is blocked`, 'LINK_BLOCKED', { link_id: linkId });
    this.name = 'LinkBlockedError';
  }
}

export class InvalidTransitionError extends ConflictError {
  constructor(entity: string, from: string, to: string) {
    super(`Cannot move ${entity} from ${from} to ${to}`, 'INVALID_TRANSITION', { entity, from, to });
    this.name = 'InvalidTransitionError';
  }
}

export class DuplicateError extends ConflictError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DUPLICATE', details);
    this.name = 'DuplicateError';
  }
}

export class PolicyDeniedError extends SwitchboardError {
  constructor(message: string, code = 'POLICY_DENIED', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'PolicyDeniedError';
  }
}

export interface DeniedRecipient {
  recipient: string;
  reason: string;
}

export class DeliveryDeniedError extends PolicyDeniedError {
  constructor(public readonly denied: DeniedRecipient[]) {
    const list = denied.map(d => `${d.recipient} (${d.reason})`).join(', ');
    super(`Delivery denied: ${list}`, 'DELIVERY_DENIED', { denied });
    this.name = 'DeliveryDeniedError';
  }
}

export class InactiveAgentError extends PolicyDeniedError {
  constructor(ref: string) {
    super(`Agent is deregistered: ${ref}`, 'AGENT_INACTIVE', { agent: ref });
    this.name = 'InactiveAgentError';
  }
}

export class PermissionError extends SwitchboardError {
  constructor(message: string, code = 'PERMISSION_DENIED', details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'PermissionError';
  }
}

export class NotOwnerError extends PermissionError {
  constructor(entity: string, id: number, agent: string) {
    super(`${agent} does not own ${entity} ${id}`, 'NOT_OWNER', { entity, id, agent });
    this.name = 'NotOwnerError';
  }
}

export class NotRecipientError extends PermissionError {
  constructor(messageId: number, agent: string) {
    super(`${agent} is not a recipient of message ${messageId}`, 'NOT_RECIPIENT', {
      message_id: messageId,
      agent,
    });
    this.name = 'NotRecipientError';
  }
}

/**
 * Type guard for errors raised by this package.
 */
export function isSwitchboardError(error: unknown): error is SwitchboardError {
  return error instanceof SwitchboardError;
}

/**
 * Check for a SQLite unique-constraint failure raised by better-sqlite3.
 */
export function isUniqueViolation(error: unknown): error is Error & { code: string } {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  );
}
