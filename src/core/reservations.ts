import type Database from 'better-sqlite3';
import type { Agent, AgentRef, FileReservation, ReservationWithAgent } from '../types.js';
import {
  createReservation,
  deleteStaleReservations,
  getActiveReservations,
  getReservation,
  markReservationReleased,
} from '../db/queries.js';
import { recordActivity, resolveActiveAgent, resolveAgent } from './agents.js';
import {
  AlreadyReleasedError,
  NotFoundError,
  NotOwnerError,
  ReservationConflictError,
  ValidationError,
} from './errors.js';
import { requireProject } from './projects.js';
import { matchingPaths, normalizePattern, patternsOverlap } from './patterns.js';
import { getNumberSetting, writeTransaction } from './store.js';
import { addSeconds, daysAgo, now } from './time.js';
import {
  assertMaxLength,
  assertPathPattern,
  assertPositiveInteger,
  assertTtl,
  MAX_REASON_LENGTH,
} from './validation.js';

export const DEFAULT_TTL_SECONDS = 3600;

export interface ReserveInput extends AgentRef {
  pathPattern: string;
  exclusive?: boolean;        // default true
  ttlSeconds?: number;        // default from settings
  reason?: string;
}

export interface PathConflict {
  path: string;
  reservation: ReservationWithAgent;
}

/**
 * Two claims conflict when their patterns overlap and at least one is exclusive.
 */
export function reservationsConflict(
  a: { path_pattern: string; exclusive: boolean },
  b: { path_pattern: string; exclusive: boolean }
): boolean {
  if (!a.exclusive && !b.exclusive) return false;
  return patternsOverlap(a.path_pattern, b.path_pattern);
}

/**
 * Active reservations of other agents that would conflict with a new claim.
 */
export function findConflicts(
  db: Database.Database,
  agent: Agent,
  claim: { path_pattern: string; exclusive: boolean },
  at: string
): ReservationWithAgent[] {
  return getActiveReservations(db, agent.project_id, at)
    .filter(r => r.agent_id !== agent.id)
    .filter(r => reservationsConflict(r, claim));
}

function resolveTtl(db: Database.Database, ttlSeconds: number | undefined): number {
  const ttl = ttlSeconds ?? getNumberSetting(db, 'default_reservation_ttl_seconds', DEFAULT_TTL_SECONDS);
  assertTtl(ttl);
  return ttl;
}

/**
 * Claim a path pattern.
 *
 * Conflict check and insert share one immediate transaction, so two
 * concurrent overlapping requests cannot both succeed. Overlap with the
 * caller's own reservations is allowed and leaves them in place.
 *
 * @throws ValidationError for an empty pattern or a non-positive TTL
 * @throws ReservationConflictError listing every conflicting reservation
 */
export function reserve(db: Database.Database, input: ReserveInput): FileReservation {
  const pathPattern = assertPathPattern(normalizePattern(input.pathPattern));
  const reason = input.reason ?? '';
  assertMaxLength('reason', reason, MAX_REASON_LENGTH);
  if (input.ttlSeconds !== undefined) {
    assertTtl(input.ttlSeconds);
  }
  const exclusive = input.exclusive ?? true;

  return writeTransaction(db, () => {
    const agent = resolveActiveAgent(db, input);
    const ttl = resolveTtl(db, input.ttlSeconds);
    const ts = now();

    const conflicts = findConflicts(db, agent, { path_pattern: pathPattern, exclusive }, ts);
    if (conflicts.length > 0) {
      throw new ReservationConflictError(pathPattern, conflicts);
    }

    recordActivity(db, agent, ts);
    return createReservation(db, {
      project_id: agent.project_id,
      agent_id: agent.id,
      path_pattern: pathPattern,
      exclusive: exclusive ? 1 : 0,
      reason,
      created_ts: ts,
      expires_ts: addSeconds(ts, ttl),
    });
  });
}

function requireOwnedReservation(
  db: Database.Database,
  reservationId: number,
  agent: Agent,
  at: string
): FileReservation {
  const reservation = getReservation(db, reservationId, at);
  if (!reservation || reservation.project_id !== agent.project_id) {
    throw new NotFoundError(`Reservation not found: ${reservationId}`, 'RESERVATION_NOT_FOUND', {
      reservation_id: reservationId,
    });
  }
  if (reservation.agent_id !== agent.id) {
    throw new NotOwnerError('reservation', reservationId, agent.name);
  }
  if (reservation.released_ts !== null) {
    throw new AlreadyReleasedError(reservationId, reservation.released_ts);
  }
  return reservation;
}

/**
 * Release a reservation held by `agent`.
 * Deregistered agents may still release what they hold.
 * @throws NotFoundError, NotOwnerError, AlreadyReleasedError (nothing written)
 */
export function release(db: Database.Database, reservationId: number, agentRef: AgentRef): FileReservation {
  return writeTransaction(db, () => {
    const agent = resolveAgent(db, agentRef);
    const ts = now();
    const reservation = requireOwnedReservation(db, reservationId, agent, ts);

    markReservationReleased(db, reservation.id, ts);
    recordActivity(db, agent, ts);
    return { ...reservation, released_ts: ts, state: 'released' };
  });
}

/**
 * Release every active reservation of an agent, or only those whose
 * pattern is listed.
 * @returns the reservations released by this call
 */
export function releaseAll(
  db: Database.Database,
  agentRef: AgentRef,
  patterns?: string[]
): FileReservation[] {
  const wanted = patterns ? new Set(patterns.map(normalizePattern)) : null;

  return writeTransaction(db, () => {
    const agent = resolveAgent(db, agentRef);
    const ts = now();
    const held = getActiveReservations(db, agent.project_id, ts)
      .filter(r => r.agent_id === agent.id)
      .filter(r => wanted === null || wanted.has(r.path_pattern));

    const released: FileReservation[] = [];
    for (const reservation of held) {
      if (markReservationReleased(db, reservation.id, ts)) {
        const { agent_name: _agentName, ...rest } = reservation;
        released.push({ ...rest, released_ts: ts, state: 'released' });
      }
    }

    recordActivity(db, agent, ts);
    return released;
  });
}

/**
 * Renew a reservation. The old record is released and a new one with the
 * same pattern, exclusivity and reason is created; records are never
 * extended in place.
 * @throws NotFoundError, NotOwnerError, AlreadyReleasedError
 * @throws ReservationConflictError if another agent claimed an overlapping
 *   path after the old reservation expired
 */
export function renew(
  db: Database.Database,
  reservationId: number,
  agentRef: AgentRef,
  ttlSeconds?: number
): FileReservation {
  if (ttlSeconds !== undefined) {
    assertTtl(ttlSeconds);
  }

  return writeTransaction(db, () => {
    const agent = resolveActiveAgent(db, agentRef);
    const ttl = resolveTtl(db, ttlSeconds);
    const ts = now();
    const previous = requireOwnedReservation(db, reservationId, agent, ts);

    const conflicts = findConflicts(db, agent, previous, ts);
    if (conflicts.length > 0) {
      throw new ReservationConflictError(previous.path_pattern, conflicts);
    }

    markReservationReleased(db, previous.id, ts);
    recordActivity(db, agent, ts);
    return createReservation(db, {
      project_id: previous.project_id,
      agent_id: agent.id,
      path_pattern: previous.path_pattern,
      exclusive: previous.exclusive ? 1 : 0,
      reason: previous.reason,
      created_ts: ts,
      expires_ts: addSeconds(ts, ttl),
    });
  });
}

/**
 * List active reservations of a project, optionally only those whose
 * pattern overlaps `pathPattern`. Expired reservations are skipped lazily.
 */
export function listActive(
  db: Database.Database,
  projectSlug: string,
  pathPattern?: string
): ReservationWithAgent[] {
  const project = requireProject(db, projectSlug);
  const active = getActiveReservations(db, project.id, now());
  if (pathPattern === undefined) {
    return active;
  }
  const pattern = assertPathPattern(normalizePattern(pathPattern));
  return active.filter(r => patternsOverlap(r.path_pattern, pattern));
}

/**
 * Check concrete file paths (e.g., staged files) against other agents'
 * exclusive reservations.
 * @returns one entry per (path, reservation) pair that blocks the agent
 */
export function findPathConflicts(
  db: Database.Database,
  agentRef: AgentRef,
  filePaths: string[]
): PathConflict[] {
  if (filePaths.some(p => p.trim().length === 0)) {
    throw new ValidationError('File paths must not be empty', 'INVALID_PATH');
  }

  const agent = resolveAgent(db, agentRef);
  const others = getActiveReservations(db, agent.project_id, now())
    .filter(r => r.agent_id !== agent.id && r.exclusive);

  const conflicts: PathConflict[] = [];
  for (const reservation of others) {
    for (const path of matchingPaths(filePaths, reservation.path_pattern)) {
      conflicts.push({ path, reservation });
    }
  }
  return conflicts;
}

/**
 * Delete released or expired reservations older than `olderThanDays`.
 * Storage hygiene only: inactive records never affect conflict checks.
 * @returns Number of reservations deleted
 */
export function pruneReservations(db: Database.Database, olderThanDays: number): number {
  assertPositiveInteger('days', olderThanDays);
  return writeTransaction(db, () => deleteStaleReservations(db, daysAgo(olderThanDays), now()));
}
