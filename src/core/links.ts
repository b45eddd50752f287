import type Database from 'better-sqlite3';
import type { AgentLink, AgentRef } from '../types.js';
import {
  createLink,
  getLink as getLinkRow,
  getLinkByPair,
  getLinksForAgent,
  updateLinkExpiry,
  updateLinkStatus,
} from '../db/queries.js';
import { recordActivity, resolveActiveAgent, resolveAgent } from './agents.js';
import { LinkBlockedError, NotFoundError, NotOwnerError, ValidationError } from './errors.js';
import { writeTransaction } from './store.js';
import { addSeconds, now, secondsBetween } from './time.js';
import { assertMaxLength, assertTtl, MAX_REASON_LENGTH } from './validation.js';

export interface RequestLinkInput {
  from: AgentRef;
  to: AgentRef;
  reason?: string;
  ttlSeconds?: number;        // counted from approval; never lapses when omitted
}

export type LinkDirection = 'outgoing' | 'incoming' | 'both';

/**
 * Ask `to` for permission to contact it. Links are directed: a request from
 * A to B says nothing about B to A.
 *
 * @returns the new pending link, or the existing one for this direction
 * @throws LinkBlockedError if the direction was blocked
 */
export function requestLink(db: Database.Database, input: RequestLinkInput): AgentLink {
  const reason = input.reason ?? '';
  assertMaxLength('reason', reason, MAX_REASON_LENGTH);
  if (input.ttlSeconds !== undefined) {
    assertTtl(input.ttlSeconds);
  }

  return writeTransaction(db, () => {
    const from = resolveActiveAgent(db, input.from);
    const to = resolveAgent(db, input.to);
    if (from.id === to.id) {
      throw new ValidationError('An agent cannot link to itself', 'INVALID_LINK');
    }

    const ts = now();
    recordActivity(db, from, ts);

    const existing = getLinkByPair(
      db,
      { projectId: from.project_id, agentId: from.id },
      { projectId: to.project_id, agentId: to.id }
    );
    if (existing) {
      if (existing.status === 'blocked') {
        throw new LinkBlockedError(existing.id);
      }
      return existing;
    }

    return createLink(db, {
      a_project_id: from.project_id,
      a_agent_id: from.id,
      b_project_id: to.project_id,
      b_agent_id: to.id,
      status: 'pending',
      reason,
      created_ts: ts,
      updated_ts: ts,
      expires_ts: input.ttlSeconds !== undefined ? addSeconds(ts, input.ttlSeconds) : null,
    });
  });
}

function requireLink(db: Database.Database, linkId: number): AgentLink {
  const link = getLinkRow(db, linkId);
  if (!link) {
    throw new NotFoundError(`Link not found: ${linkId}`, 'LINK_NOT_FOUND', { link_id: linkId });
  }
  return link;
}

/**
 * Approve a pending link. Only the target agent may approve.
 * A link requested with a TTL lapses that many seconds after approval.
 * @throws NotOwnerError, LinkBlockedError
 */
export function approveLink(db: Database.Database, linkId: number, approver: AgentRef): AgentLink {
  return writeTransaction(db, () => {
    const link = requireLink(db, linkId);
    const agent = resolveActiveAgent(db, approver);
    if (agent.id !== link.b_agent_id) {
      throw new NotOwnerError('link', linkId, agent.name);
    }
    if (link.status === 'blocked') {
      throw new LinkBlockedError(linkId);
    }

    const ts = now();
    recordActivity(db, agent, ts);
    if (link.status === 'approved') {
      return link;
    }

    const expiresTs = link.expires_ts === null
      ? null
      : addSeconds(ts, secondsBetween(link.created_ts, link.expires_ts));
    updateLinkStatus(db, linkId, 'approved', ts);
    updateLinkExpiry(db, linkId, expiresTs);
    return { ...link, status: 'approved', updated_ts: ts, expires_ts: expiresTs };
  });
}

/**
 * Block a link from either end. Blocked is terminal.
 * @throws NotOwnerError if `actor` is neither endpoint
 */
export function blockLink(db: Database.Database, linkId: number, actor: AgentRef): AgentLink {
  return writeTransaction(db, () => {
    const link = requireLink(db, linkId);
    const agent = resolveAgent(db, actor);
    if (agent.id !== link.a_agent_id && agent.id !== link.b_agent_id) {
      throw new NotOwnerError('link', linkId, agent.name);
    }
    if (link.status === 'blocked') {
      return link;
    }

    const ts = now();
    updateLinkStatus(db, linkId, 'blocked', ts);
    recordActivity(db, agent, ts);
    return { ...link, status: 'blocked', updated_ts: ts };
  });
}

export function getLink(db: Database.Database, linkId: number): AgentLink | undefined {
  return getLinkRow(db, linkId);
}

export function listLinks(
  db: Database.Database,
  agentRef: AgentRef,
  options: { direction?: LinkDirection } = {}
): AgentLink[] {
  const agent = resolveAgent(db, agentRef);
  return getLinksForAgent(db, agent.id, options.direction ?? 'both');
}
