import type Database from 'better-sqlite3';
import type { Agent } from '../types.js';
import { getLinkByPair } from '../db/queries.js';
import { requireAgentById } from './agents.js';
import { PolicyDeniedError } from './errors.js';
import { isUnexpired, now } from './time.js';

export const DENY_RECIPIENT_INACTIVE = 'recipient inactive';
export const DENY_BLOCKS_ALL = 'recipient blocks all contact';
export const DENY_LINK_BLOCKED = 'link blocked';
export const DENY_NO_CONTACT_PATH = 'no contact path';

export type DeliveryDecision =
  | { allowed: true }
  | { allowed: false; reason: string };

/**
 * Decide whether `sender` may deliver a message to `recipient`.
 *
 * Intra-project mail is always allowed for an active recipient. Across
 * projects the recipient's contact policy applies, and a blocked directed
 * link (sender -> recipient) denies regardless of policy.
 *
 * Pure: reads only.
 */
export function decideDelivery(db: Database.Database, sender: Agent, recipient: Agent, at = now()): DeliveryDecision {
  if (recipient.state === 'deregistered') {
    return { allowed: false, reason: DENY_RECIPIENT_INACTIVE };
  }

  if (sender.project_id === recipient.project_id) {
    return { allowed: true };
  }

  if (recipient.contact_policy === 'block_all') {
    return { allowed: false, reason: DENY_BLOCKS_ALL };
  }

  const link = getLinkByPair(
    db,
    { projectId: sender.project_id, agentId: sender.id },
    { projectId: recipient.project_id, agentId: recipient.id }
  );

  if (link?.status === 'blocked') {
    return { allowed: false, reason: DENY_LINK_BLOCKED };
  }

  switch (recipient.contact_policy) {
    case 'open':
    case 'auto':
      return { allowed: true };
    case 'contacts_only':
      if (link?.status === 'approved' && isUnexpired(link.expires_ts, at)) {
        return { allowed: true };
      }
      break;
  }

  return { allowed: false, reason: DENY_NO_CONTACT_PATH };
}

/**
 * Resolve both agents by id and decide delivery.
 * @throws UnknownAgentError if either id has no agent row
 */
export function canDeliver(db: Database.Database, senderId: number, recipientId: number): DeliveryDecision {
  const sender = requireAgentById(db, senderId);
  const recipient = requireAgentById(db, recipientId);
  return decideDelivery(db, sender, recipient);
}

/**
 * Like canDeliver, but throws on denial.
 * @throws PolicyDeniedError carrying the denial reason
 */
export function assertCanDeliver(db: Database.Database, senderId: number, recipientId: number): void {
  const decision = canDeliver(db, senderId, recipientId);
  if (!decision.allowed) {
    throw new PolicyDeniedError(`Delivery denied: ${decision.reason}`, 'POLICY_DENIED', {
      sender_id: senderId,
      recipient_id: recipientId,
      reason: decision.reason,
    });
  }
}
