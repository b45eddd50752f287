import type Database from 'better-sqlite3';
import type {
  Agent,
  AgentRef,
  Attachment,
  Importance,
  InboxMessage,
  InboxQueryOptions,
  Message,
  OutboxMessage,
  RecipientKind,
  RecipientWithAgent,
} from '../types.js';
import {
  createMessage,
  deleteMessagesBefore,
  getAgentByName,
  getInbox,
  getMessage as getMessageRow,
  getOutbox,
  getProject,
  getProductProjects,
  getRecipient,
  getRecipients as getRecipientRows,
  getThreadMessages,
  insertRecipient,
  setRecipientAck,
  setRecipientRead,
} from '../db/queries.js';
import {
  formatAgentAddress,
  parseAgentAddress,
  recordActivity,
  requireAgentById,
  resolveActiveAgent,
  resolveAgent,
} from './agents.js';
import { DeliveryDeniedError, NotFoundError, NotRecipientError, ValidationError } from './errors.js';
import type { DeniedRecipient } from './errors.js';
import { decideDelivery } from './policy.js';
import { requireProduct, requireProject } from './projects.js';
import { writeTransaction } from './store.js';
import { daysAgo, now } from './time.js';
import {
  assertMaxLength,
  assertPositiveInteger,
  MAX_SUBJECT_LENGTH,
  MAX_THREAD_ID_LENGTH,
  parseAttachments,
  parseImportance,
} from './validation.js';

export interface SendInput {
  project: string;            // sender's project slug
  sender: string;             // sender name
  to: string[];               // "Name" or "Name@project-slug"
  cc?: string[];
  subject: string;
  body: string;
  importance?: Importance;
  ackRequired?: boolean;
  attachments?: Attachment[];
  threadId?: string;
}

export interface ReplyInput {
  messageId: number;
  sender: AgentRef;
  body: string;
  to?: string[];              // defaults to the original sender
  cc?: string[];
  importance?: Importance;
  ackRequired?: boolean;
  attachments?: Attachment[];
}

export interface SentMessage extends Message {
  recipients: RecipientWithAgent[];
}

interface Delivery {
  agent: Agent;
  kind: RecipientKind;
  address: string;
}

/**
 * Collapse duplicate addresses into one delivery per agent; `to` wins over `cc`.
 */
function resolveDeliveries(db: Database.Database, homeProject: string, to: string[], cc: string[]): Delivery[] {
  const byAgent = new Map<number, Delivery>();
  const entries: [string, RecipientKind][] = [
    ...to.map((address): [string, RecipientKind] => [address, 'to']),
    ...cc.map((address): [string, RecipientKind] => [address, 'cc']),
  ];

  for (const [address, kind] of entries) {
    const parsed = parseAgentAddress(address);
    const agent = resolveAgent(db, { project: parsed.project ?? homeProject, name: parsed.name });
    if (!byAgent.has(agent.id)) {
      byAgent.set(agent.id, { agent, kind, address: address.trim() });
    }
  }

  return [...byAgent.values()];
}

/**
 * Send a message.
 *
 * Every recipient is checked before anything is written. One denial fails
 * the whole send, and the error names every denied recipient.
 *
 * @throws ValidationError, UnknownAgentError, InactiveAgentError
 * @throws DeliveryDeniedError
 */
export function send(db: Database.Database, input: SendInput): SentMessage {
  if (input.to.length === 0) {
    throw new ValidationError('At least one "to" recipient is required', 'NO_RECIPIENTS');
  }
  const subject = input.subject.trim();
  if (subject.length === 0) {
    throw new ValidationError('Subject must not be empty', 'INVALID_SUBJECT');
  }
  assertMaxLength('subject', subject, MAX_SUBJECT_LENGTH);
  if (input.threadId !== undefined) {
    if (input.threadId.trim().length === 0) {
      throw new ValidationError('Thread id must not be empty', 'INVALID_THREAD_ID');
    }
    assertMaxLength('thread_id', input.threadId, MAX_THREAD_ID_LENGTH);
  }
  const importance = parseImportance(input.importance ?? 'normal');
  const attachments = parseAttachments(input.attachments ?? []);

  return writeTransaction(db, () => {
    const sender = resolveActiveAgent(db, { project: input.project, name: input.sender });
    const deliveries = resolveDeliveries(db, input.project, input.to, input.cc ?? []);
    const ts = now();

    const denied: DeniedRecipient[] = [];
    for (const delivery of deliveries) {
      const decision = decideDelivery(db, sender, delivery.agent, ts);
      if (!decision.allowed) {
        denied.push({ recipient: delivery.address, reason: decision.reason });
      }
    }
    if (denied.length > 0) {
      throw new DeliveryDeniedError(denied);
    }

    const message = createMessage(db, {
      project_id: sender.project_id,
      sender_id: sender.id,
      thread_id: input.threadId ?? null,
      subject,
      body_md: input.body,
      importance,
      ack_required: input.ackRequired ?? false,
      created_ts: ts,
      attachments,
    });

    for (const delivery of deliveries) {
      insertRecipient(db, message.id, delivery.agent.id, delivery.kind);
    }
    recordActivity(db, sender, ts);

    return { ...message, recipients: getRecipientRows(db, message.id) };
  });
}

/**
 * Reply within the original thread. The subject gets a single "Re: " prefix.
 */
export function reply(db: Database.Database, input: ReplyInput): SentMessage {
  const original = requireMessage(db, input.messageId);

  let to = input.to;
  if (to === undefined) {
    const author = requireAgentById(db, original.sender_id);
    const authorProject = getProject(db, author.project_id);
    if (!authorProject) {
      throw new NotFoundError(`Project not found: #${author.project_id}`, 'PROJECT_NOT_FOUND');
    }
    to = [formatAgentAddress(author.name, authorProject.slug, input.sender.project)];
  }

  const subject = /^re:\s/i.test(original.subject) ? original.subject : `Re: ${original.subject}`;

  return send(db, {
    project: input.sender.project,
    sender: input.sender.name,
    to,
    cc: input.cc,
    subject,
    body: input.body,
    importance: input.importance ?? original.importance,
    ackRequired: input.ackRequired,
    attachments: input.attachments,
    threadId: original.thread_id ?? String(original.id),
  });
}

function requireMessage(db: Database.Database, messageId: number): Message {
  const message = getMessageRow(db, messageId);
  if (!message) {
    throw new NotFoundError(`Message not found: ${messageId}`, 'MESSAGE_NOT_FOUND', { message_id: messageId });
  }
  return message;
}

function requireRecipient(db: Database.Database, messageId: number, agentRef: AgentRef): Agent {
  requireMessage(db, messageId);
  const agent = resolveAgent(db, agentRef);
  if (!getRecipient(db, messageId, agent.id)) {
    throw new NotRecipientError(messageId, agent.name);
  }
  return agent;
}

/**
 * Mark a message read for one recipient.
 * @returns the read timestamp; repeated calls return the first one
 * @throws NotFoundError, NotRecipientError
 */
export function markRead(db: Database.Database, messageId: number, agentRef: AgentRef): string {
  return writeTransaction(db, () => {
    const agent = requireRecipient(db, messageId, agentRef);
    const ts = now();
    if (setRecipientRead(db, messageId, agent.id, ts)) {
      recordActivity(db, agent, ts);
    }
    return storedTimestamp(db, messageId, agent.id, 'read_ts');
  });
}

/**
 * Acknowledge a message for one recipient. Also marks it read.
 * @returns the ack timestamp; repeated calls return the first one
 * @throws NotFoundError, NotRecipientError
 */
export function markAck(db: Database.Database, messageId: number, agentRef: AgentRef): string {
  return writeTransaction(db, () => {
    const agent = requireRecipient(db, messageId, agentRef);
    const ts = now();
    setRecipientRead(db, messageId, agent.id, ts);
    if (setRecipientAck(db, messageId, agent.id, ts)) {
      recordActivity(db, agent, ts);
    }
    return storedTimestamp(db, messageId, agent.id, 'ack_ts');
  });
}

function storedTimestamp(
  db: Database.Database,
  messageId: number,
  agentId: number,
  column: 'read_ts' | 'ack_ts'
): string {
  const value = getRecipient(db, messageId, agentId)?.[column];
  if (!value) {
    throw new NotFoundError(`No ${column} recorded for message ${messageId}`, 'RECIPIENT_STATE_MISSING');
  }
  return value;
}

export function getMessage(db: Database.Database, messageId: number): Message | undefined {
  return getMessageRow(db, messageId);
}

/**
 * Messages of a thread, oldest first.
 */
export function getThread(db: Database.Database, projectSlug: string, threadId: string): Message[] {
  const project = requireProject(db, projectSlug);
  return getThreadMessages(db, project.id, threadId);
}

export function getRecipients(db: Database.Database, messageId: number): RecipientWithAgent[] {
  requireMessage(db, messageId);
  return getRecipientRows(db, messageId);
}

/**
 * Messages delivered to an agent, newest first.
 */
export function fetchInbox(
  db: Database.Database,
  agentRef: AgentRef,
  options: InboxQueryOptions = {}
): InboxMessage[] {
  assertLimit(options.limit);
  const agent = resolveAgent(db, agentRef);
  return getInbox(db, [agent.id], options);
}

/**
 * Messages sent by an agent, newest first, with recipient addresses as the
 * sender would write them.
 */
export function fetchOutbox(
  db: Database.Database,
  agentRef: AgentRef,
  options: { limit?: number } = {}
): OutboxMessage[] {
  assertLimit(options.limit);
  const agent = resolveAgent(db, agentRef);
  const slugs = new Map<number, string>();
  const slugFor = (projectId: number): string => {
    let slug = slugs.get(projectId);
    if (slug === undefined) {
      slug = getProject(db, projectId)?.slug ?? String(projectId);
      slugs.set(projectId, slug);
    }
    return slug;
  };

  return getOutbox(db, agent.id, options.limit).map(message => ({
    ...message,
    recipients: getRecipientRows(db, message.id).map(r =>
      formatAgentAddress(r.agent_name, slugFor(r.project_id), agentRef.project)
    ),
  }));
}

/**
 * Inbox of every agent named `agentName` across the projects of a product.
 */
export function fetchProductInbox(
  db: Database.Database,
  productRef: string,
  agentName: string,
  options: InboxQueryOptions = {}
): InboxMessage[] {
  assertLimit(options.limit);
  const product = requireProduct(db, productRef);
  const agentIds: number[] = [];
  for (const project of getProductProjects(db, product.id)) {
    const agent = getAgentByName(db, project.id, agentName);
    if (agent) agentIds.push(agent.id);
  }
  return getInbox(db, agentIds, options);
}

/**
 * Delete messages older than `olderThanDays`, recipient rows included.
 * @returns Number of messages deleted
 */
export function pruneMessages(db: Database.Database, olderThanDays: number): number {
  assertPositiveInteger('days', olderThanDays);
  return writeTransaction(db, () => deleteMessagesBefore(db, daysAgo(olderThanDays)));
}

function assertLimit(limit: number | undefined): void {
  if (limit !== undefined) {
    assertPositiveInteger('limit', limit);
  }
}
