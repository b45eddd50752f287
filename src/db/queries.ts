import type {
  Agent,
  AgentLink,
  AgentRow,
  FileReservation,
  FileReservationRow,
  InboxMessage,
  InboxQueryOptions,
  LinkStatus,
  Message,
  MessageRecipient,
  MessageRow,
  Product,
  Project,
  ProjectSiblingSuggestion,
  RecipientKind,
  RecipientWithAgent,
  ReservationWithAgent,
  SettingEntry,
  SiblingStatus,
} from '../types.js';
import type Database from 'better-sqlite3';
import { parseAttachments } from '../core/validation.js';

// Project functions

/**
 * Get project by id.
 */
export function getProject(db: Database.Database, projectId: number): Project | undefined {
  const stmt = db.prepare('SELECT * FROM projects WHERE id = ?');
  return stmt.get(projectId) as Project | undefined;
}

/**
 * Get project by slug.
 * @returns Project or undefined if not found
 */
export function getProjectBySlug(db: Database.Database, slug: string): Project | undefined {
  const stmt = db.prepare('SELECT * FROM projects WHERE slug = ?');
  return stmt.get(slug) as Project | undefined;
}

/**
 * Create new project.
 * @throws if slug already exists
 */
export function createProject(
  db: Database.Database,
  project: Omit<Project, 'id'>
): Project {
  const stmt = db.prepare(`
    INSERT INTO projects (slug, human_key, created_at)
    VALUES (?, ?, ?)
  `);
  const result = stmt.run(project.slug, project.human_key, project.created_at);
  return { id: Number(result.lastInsertRowid), ...project };
}

export function getAllProjects(db: Database.Database): Project[] {
  const stmt = db.prepare('SELECT * FROM projects ORDER BY slug');
  return stmt.all() as Project[];
}

// Product functions

export function getProductByName(db: Database.Database, name: string): Product | undefined {
  const stmt = db.prepare('SELECT * FROM products WHERE name = ?');
  return stmt.get(name) as Product | undefined;
}

export function getProductByUid(db: Database.Database, productUid: string): Product | undefined {
  const stmt = db.prepare('SELECT * FROM products WHERE product_uid = ?');
  return stmt.get(productUid) as Product | undefined;
}

export function createProduct(db: Database.Database, product: Omit<Product, 'id'>): Product {
  const stmt = db.prepare(`
    INSERT INTO products (product_uid, name, created_at)
    VALUES (?, ?, ?)
  `);
  const result = stmt.run(product.product_uid, product.name, product.created_at);
  return { id: Number(result.lastInsertRowid), ...product };
}

/**
 * Attach a project to a product.
 * @returns false if the link already existed
 */
export function linkProductProject(
  db: Database.Database,
  productId: number,
  projectId: number,
  createdAt: string
): boolean {
  const stmt = db.prepare(`
    INSERT OR IGNORE INTO product_project_links (product_id, project_id, created_at)
    VALUES (?, ?, ?)
  `);
  return stmt.run(productId, projectId, createdAt).changes > 0;
}

export function getProductProjects(db: Database.Database, productId: number): Project[] {
  const stmt = db.prepare(`
    SELECT p.* FROM projects p
    JOIN product_project_links l ON l.project_id = p.id
    WHERE l.product_id = ?
    ORDER BY p.slug
  `);
  return stmt.all(productId) as Project[];
}

// Agent functions

/**
 * Convert AgentRow to Agent (derive lifecycle state).
 */
export function parseAgentRow(row: AgentRow): Agent {
  return {
    ...row,
    state: row.deregistered_ts === null ? 'active' : 'deregistered',
  };
}

export function getAgentById(db: Database.Database, agentId: number): Agent | undefined {
  const stmt = db.prepare('SELECT * FROM agents WHERE id = ?');
  const row = stmt.get(agentId) as AgentRow | undefined;
  return row ? parseAgentRow(row) : undefined;
}

/**
 * Get agent by exact name within a project.
 * @returns Agent or undefined if not found
 */
export function getAgentByName(
  db: Database.Database,
  projectId: number,
  name: string
): Agent | undefined {
  const stmt = db.prepare('SELECT * FROM agents WHERE project_id = ? AND name = ?');
  const row = stmt.get(projectId, name) as AgentRow | undefined;
  return row ? parseAgentRow(row) : undefined;
}

/**
 * Get agents of a project, optionally including deregistered ones.
 */
export function getAgentsByProject(
  db: Database.Database,
  projectId: number,
  includeDeregistered = false
): Agent[] {
  const stmt = db.prepare(`
    SELECT * FROM agents
    WHERE project_id = ? ${includeDeregistered ? '' : 'AND deregistered_ts IS NULL'}
    ORDER BY name
  `);
  return (stmt.all(projectId) as AgentRow[]).map(parseAgentRow);
}

/**
 * Create new agent.
 * @throws if name already exists in the project
 */
export function createAgent(db: Database.Database, agent: Omit<AgentRow, 'id'>): Agent {
  const stmt = db.prepare(`
    INSERT INTO agents (
      project_id, name, program, model, task_description, inception_ts, last_active_ts,
      attachments_policy, contact_policy, deregistered_ts
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const result = stmt.run(
    agent.project_id,
    agent.name,
    agent.program,
    agent.model,
    agent.task_description,
    agent.inception_ts,
    agent.last_active_ts,
    agent.attachments_policy,
    agent.contact_policy,
    agent.deregistered_ts
  );
  return parseAgentRow({ id: Number(result.lastInsertRowid), ...agent });
}

/**
 * Update agent fields.
 * Only updates provided fields.
 */
export function updateAgent(
  db: Database.Database,
  agentId: number,
  updates: Partial<Pick<AgentRow,
    'program' | 'model' | 'task_description' | 'last_active_ts' |
    'attachments_policy' | 'contact_policy' | 'deregistered_ts'>>
): void {
  const columns = [
    'program', 'model', 'task_description', 'last_active_ts',
    'attachments_policy', 'contact_policy', 'deregistered_ts',
  ] as const;
  const fields: string[] = [];
  const values: (string | number | null)[] = [];

  for (const column of columns) {
    const value = updates[column];
    if (value === undefined) continue;
    fields.push(`${column} = ?`);
    values.push(value);
  }

  if (fields.length === 0) return;

  values.push(agentId);

  const sql = `UPDATE agents SET ${fields.join(', ')} WHERE id = ?`;
  const stmt = db.prepare(sql);
  stmt.run(...values);
}

/**
 * Record activity for an agent.
 */
export function touchAgent(db: Database.Database, agentId: number, ts: string): void {
  db.prepare('UPDATE agents SET last_active_ts = ? WHERE id = ?').run(ts, agentId);
}

// Message functions

/**
 * Convert MessageRow to Message (decode attachments JSON, ack flag).
 */
export function parseMessageRow(row: MessageRow): Message {
  return {
    id: row.id,
    project_id: row.project_id,
    sender_id: row.sender_id,
    thread_id: row.thread_id,
    subject: row.subject,
    body_md: row.body_md,
    importance: row.importance,
    ack_required: row.ack_required === 1,
    created_ts: row.created_ts,
    attachments: parseAttachments(JSON.parse(row.attachments)),
  };
}

/**
 * Insert a message row.
 * When thread_id is null the message roots its own thread (thread_id = id).
 */
export function createMessage(db: Database.Database, message: Omit<Message, 'id'>): Message {
  const stmt = db.prepare(`
    INSERT INTO messages (
      project_id, sender_id, thread_id, subject, body_md, importance, ack_required, created_ts, attachments
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const result = stmt.run(
    message.project_id,
    message.sender_id,
    message.thread_id,
    message.subject,
    message.body_md,
    message.importance,
    message.ack_required ? 1 : 0,
    message.created_ts,
    JSON.stringify(message.attachments)
  );
  const id = Number(result.lastInsertRowid);

  let threadId = message.thread_id;
  if (threadId === null) {
    threadId = String(id);
    db.prepare('UPDATE messages SET thread_id = ? WHERE id = ?').run(threadId, id);
  }

  return { ...message, id, thread_id: threadId };
}

export function getMessage(db: Database.Database, messageId: number): Message | undefined {
  const stmt = db.prepare('SELECT * FROM messages WHERE id = ?');
  const row = stmt.get(messageId) as MessageRow | undefined;
  return row ? parseMessageRow(row) : undefined;
}

/**
 * Get every message of a thread in chronological order.
 */
export function getThreadMessages(
  db: Database.Database,
  projectId: number,
  threadId: string
): Message[] {
  const stmt = db.prepare(`
    SELECT * FROM messages
    WHERE project_id = ? AND thread_id = ?
    ORDER BY created_ts ASC, id ASC
  `);
  return (stmt.all(projectId, threadId) as MessageRow[]).map(parseMessageRow);
}

export function insertRecipient(
  db: Database.Database,
  messageId: number,
  agentId: number,
  kind: RecipientKind
): void {
  db.prepare(`
    INSERT INTO message_recipients (message_id, agent_id, kind, read_ts, ack_ts)
    VALUES (?, ?, ?, NULL, NULL)
  `).run(messageId, agentId, kind);
}

export function getRecipient(
  db: Database.Database,
  messageId: number,
  agentId: number
): MessageRecipient | undefined {
  const stmt = db.prepare('SELECT * FROM message_recipients WHERE message_id = ? AND agent_id = ?');
  return stmt.get(messageId, agentId) as MessageRecipient | undefined;
}

/**
 * Get all recipients of a message with their names.
 */
export function getRecipients(db: Database.Database, messageId: number): RecipientWithAgent[] {
  const stmt = db.prepare(`
    SELECT r.*, a.name AS agent_name, a.project_id AS project_id
    FROM message_recipients r
    JOIN agents a ON a.id = r.agent_id
    WHERE r.message_id = ?
    ORDER BY CASE r.kind WHEN 'to' THEN 0 ELSE 1 END, a.name
  `);
  return stmt.all(messageId) as RecipientWithAgent[];
}

/**
 * Set read_ts unless already set.
 * @returns true if this call set it
 */
export function setRecipientRead(
  db: Database.Database,
  messageId: number,
  agentId: number,
  ts: string
): boolean {
  const stmt = db.prepare(`
    UPDATE message_recipients SET read_ts = ?
    WHERE message_id = ? AND agent_id = ? AND read_ts IS NULL
  `);
  return stmt.run(ts, messageId, agentId).changes > 0;
}

/**
 * Set ack_ts unless already set.
 * @returns true if this call set it
 */
export function setRecipientAck(
  db: Database.Database,
  messageId: number,
  agentId: number,
  ts: string
): boolean {
  const stmt = db.prepare(`
    UPDATE message_recipients SET ack_ts = ?
    WHERE message_id = ? AND agent_id = ? AND ack_ts IS NULL
  `);
  return stmt.run(ts, messageId, agentId).changes > 0;
}

type InboxRow = MessageRow & {
  sender_name: string;
  kind: RecipientKind;
  read_ts: string | null;
  ack_ts: string | null;
};

/**
 * Get messages delivered to any of the given agents, newest first.
 */
export function getInbox(
  db: Database.Database,
  agentIds: number[],
  options: InboxQueryOptions = {}
): InboxMessage[] {
  if (agentIds.length === 0) return [];

  const conditions: string[] = [`r.agent_id IN (${agentIds.map(() => '?').join(', ')})`];
  const params: (string | number)[] = [...agentIds];

  if (options.unreadOnly) {
    conditions.push('r.read_ts IS NULL');
  }
  if (options.urgentOnly) {
    conditions.push(`m.importance IN ('high', 'urgent')`);
  }
  if (options.since) {
    conditions.push('m.created_ts > ?');
    params.push(options.since);
  }

  params.push(options.limit ?? 20);

  const stmt = db.prepare(`
    SELECT m.*, s.name AS sender_name, r.kind AS kind, r.read_ts AS read_ts, r.ack_ts AS ack_ts
    FROM message_recipients r
    JOIN messages m ON m.id = r.message_id
    JOIN agents s ON s.id = m.sender_id
    WHERE ${conditions.join(' AND ')}
    ORDER BY m.created_ts DESC, m.id DESC
    LIMIT ?
  `);

  const rows = stmt.all(...params) as InboxRow[];
  return rows.map(row => ({
    ...parseMessageRow(row),
    sender_name: row.sender_name,
    kind: row.kind,
    read_ts: row.read_ts,
    ack_ts: row.ack_ts,
  }));
}

/**
 * Get messages sent by an agent, newest first.
 */
export function getOutbox(db: Database.Database, senderId: number, limit = 20): Message[] {
  const stmt = db.prepare(`
    SELECT * FROM messages
    WHERE sender_id = ?
    ORDER BY created_ts DESC, id DESC
    LIMIT ?
  `);
  return (stmt.all(senderId, limit) as MessageRow[]).map(parseMessageRow);
}

/**
 * Delete messages created before a cutoff (recipients cascade).
 * @returns Number of messages deleted
 */
export function deleteMessagesBefore(db: Database.Database, cutoff: string): number {
  const stmt = db.prepare('DELETE FROM messages WHERE created_ts < ?');
  return stmt.run(cutoff).changes;
}

// Reservation functions

/**
 * Convert FileReservationRow to FileReservation, deriving state at `at`.
 */
export function parseReservationRow(row: FileReservationRow, at: string): FileReservation {
  let state: FileReservation['state'] = 'active';
  if (row.released_ts !== null) {
    state = 'released';
  } else if (row.expires_ts <= at) {
    state = 'expired';
  }

  return {
    id: row.id,
    project_id: row.project_id,
    agent_id: row.agent_id,
    path_pattern: row.path_pattern,
    exclusive: row.exclusive === 1,
    reason: row.reason,
    created_ts: row.created_ts,
    expires_ts: row.expires_ts,
    released_ts: row.released_ts,
    state,
  };
}

export function createReservation(
  db: Database.Database,
  reservation: Omit<FileReservationRow, 'id' | 'released_ts'>
): FileReservation {
  const stmt = db.prepare(`
    INSERT INTO file_reservations (
      project_id, agent_id, path_pattern, exclusive, reason, created_ts, expires_ts, released_ts
    ) VALUES (?, ?, ?, ?, ?, ?, ?, NULL)
  `);
  const result = stmt.run(
    reservation.project_id,
    reservation.agent_id,
    reservation.path_pattern,
    reservation.exclusive,
    reservation.reason,
    reservation.created_ts,
    reservation.expires_ts
  );
  return parseReservationRow(
    { id: Number(result.lastInsertRowid), released_ts: null, ...reservation },
    reservation.created_ts
  );
}

export function getReservation(
  db: Database.Database,
  reservationId: number,
  at: string
): FileReservation | undefined {
  const stmt = db.prepare('SELECT * FROM file_reservations WHERE id = ?');
  const row = stmt.get(reservationId) as FileReservationRow | undefined;
  return row ? parseReservationRow(row, at) : undefined;
}

/**
 * Get active (unreleased, unexpired at `at`) reservations of a project.
 */
export function getActiveReservations(
  db: Database.Database,
  projectId: number,
  at: string
): ReservationWithAgent[] {
  const stmt = db.prepare(`
    SELECT r.*, a.name AS agent_name
    FROM file_reservations r
    JOIN agents a ON a.id = r.agent_id
    WHERE r.project_id = ? AND r.released_ts IS NULL AND r.expires_ts > ?
    ORDER BY r.created_ts ASC, r.id ASC
  `);
  const rows = stmt.all(projectId, at) as (FileReservationRow & { agent_name: string })[];
  return rows.map(row => ({ ...parseReservationRow(row, at), agent_name: row.agent_name }));
}

/**
 * Set released_ts on a reservation that is still held.
 * @returns true if the reservation was released by this call
 */
export function markReservationReleased(
  db: Database.Database,
  reservationId: number,
  ts: string
): boolean {
  const stmt = db.prepare(`
    UPDATE file_reservations SET released_ts = ?
    WHERE id = ? AND released_ts IS NULL
  `);
  return stmt.run(ts, reservationId).changes > 0;
}

/**
 * Delete released or expired reservations created before a cutoff.
 * @returns Number of reservations deleted
 */
export function deleteStaleReservations(db: Database.Database, cutoff: string, at: string): number {
  const stmt = db.prepare(`
    DELETE FROM file_reservations
    WHERE (released_ts IS NOT NULL OR expires_ts <= ?)
      AND created_ts < ?
  `);
  return stmt.run(at, cutoff).changes;
}

// Link functions

export function getLink(db: Database.Database, linkId: number): AgentLink | undefined {
  const stmt = db.prepare('SELECT * FROM agent_links WHERE id = ?');
  return stmt.get(linkId) as AgentLink | undefined;
}

/**
 * Get the directed link from agent A to agent B.
 */
export function getLinkByPair(
  db: Database.Database,
  a: { projectId: number; agentId: number },
  b: { projectId: number; agentId: number }
): AgentLink | undefined {
  const stmt = db.prepare(`
    SELECT * FROM agent_links
    WHERE a_project_id = ? AND a_agent_id = ? AND b_project_id = ? AND b_agent_id = ?
  `);
  return stmt.get(a.projectId, a.agentId, b.projectId, b.agentId) as AgentLink | undefined;
}

export function createLink(db: Database.Database, link: Omit<AgentLink, 'id'>): AgentLink {
  const stmt = db.prepare(`
    INSERT INTO agent_links (
      a_project_id, a_agent_id, b_project_id, b_agent_id, status, reason, created_ts, updated_ts, expires_ts
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const result = stmt.run(
    link.a_project_id,
    link.a_agent_id,
    link.b_project_id,
    link.b_agent_id,
    link.status,
    link.reason,
    link.created_ts,
    link.updated_ts,
    link.expires_ts
  );
  return { id: Number(result.lastInsertRowid), ...link };
}

export function updateLinkStatus(
  db: Database.Database,
  linkId: number,
  status: LinkStatus,
  ts: string
): void {
  db.prepare('UPDATE agent_links SET status = ?, updated_ts = ? WHERE id = ?').run(status, ts, linkId);
}

export function updateLinkExpiry(db: Database.Database, linkId: number, expiresTs: string | null): void {
  db.prepare('UPDATE agent_links SET expires_ts = ? WHERE id = ?').run(expiresTs, linkId);
}

/**
 * Get links touching an agent.
 * @param direction - 'outgoing' (agent is A), 'incoming' (agent is B) or 'both'
 */
export function getLinksForAgent(
  db: Database.Database,
  agentId: number,
  direction: 'outgoing' | 'incoming' | 'both'
): AgentLink[] {
  const where = direction === 'outgoing'
    ? 'a_agent_id = ?'
    : direction === 'incoming'
      ? 'b_agent_id = ?'
      : '(a_agent_id = ? OR b_agent_id = ?)';
  const params = direction === 'both' ? [agentId, agentId] : [agentId];
  const stmt = db.prepare(`SELECT * FROM agent_links WHERE ${where} ORDER BY created_ts, id`);
  return stmt.all(...params) as AgentLink[];
}

// Sibling suggestion functions

/**
 * Get suggestion for a pair; ids must already be ordered (a < b).
 */
export function getSiblingSuggestion(
  db: Database.Database,
  projectAId: number,
  projectBId: number
): ProjectSiblingSuggestion | undefined {
  const stmt = db.prepare(`
    SELECT * FROM project_sibling_suggestions WHERE project_a_id = ? AND project_b_id = ?
  `);
  return stmt.get(projectAId, projectBId) as ProjectSiblingSuggestion | undefined;
}

export function createSiblingSuggestion(
  db: Database.Database,
  suggestion: Omit<ProjectSiblingSuggestion, 'id'>
): ProjectSiblingSuggestion {
  const stmt = db.prepare(`
    INSERT INTO project_sibling_suggestions (
      project_a_id, project_b_id, score, status, rationale, created_ts, evaluated_ts, confirmed_ts, dismissed_ts
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const result = stmt.run(
    suggestion.project_a_id,
    suggestion.project_b_id,
    suggestion.score,
    suggestion.status,
    suggestion.rationale,
    suggestion.created_ts,
    suggestion.evaluated_ts,
    suggestion.confirmed_ts,
    suggestion.dismissed_ts
  );
  return { id: Number(result.lastInsertRowid), ...suggestion };
}

export function updateSiblingEvaluation(
  db: Database.Database,
  id: number,
  score: number,
  rationale: string,
  ts: string
): void {
  db.prepare(`
    UPDATE project_sibling_suggestions SET score = ?, rationale = ?, evaluated_ts = ? WHERE id = ?
  `).run(score, rationale, ts, id);
}

export function updateSiblingStatus(
  db: Database.Database,
  id: number,
  status: Exclude<SiblingStatus, 'suggested'>,
  ts: string
): void {
  const column = status === 'confirmed' ? 'confirmed_ts' : 'dismissed_ts';
  db.prepare(`UPDATE project_sibling_suggestions SET status = ?, ${column} = ? WHERE id = ?`)
    .run(status, ts, id);
}

export function getSiblingSuggestionsForProject(
  db: Database.Database,
  projectId: number
): ProjectSiblingSuggestion[] {
  const stmt = db.prepare(`
    SELECT * FROM project_sibling_suggestions
    WHERE project_a_id = ? OR project_b_id = ?
    ORDER BY score DESC, id ASC
  `);
  return stmt.all(projectId, projectId) as ProjectSiblingSuggestion[];
}

// Settings functions

export function getSetting(db: Database.Database, key: string): string | undefined {
  const stmt = db.prepare('SELECT value FROM settings WHERE key = ?');
  const row = stmt.get(key) as { value: string } | undefined;
  return row?.value;
}

export function setSetting(db: Database.Database, key: string, value: string): void {
  const stmt = db.prepare(`
    INSERT INTO settings (key, value) VALUES (?, ?)
    ON CONFLICT(key) DO UPDATE SET value = excluded.value
  `);
  stmt.run(key, value);
}

export function getAllSettings(db: Database.Database): SettingEntry[] {
  const stmt = db.prepare('SELECT key, value FROM settings ORDER BY key');
  return stmt.all() as SettingEntry[];
}

// Stats

export interface StoreStats {
  projects: number;
  agents: number;
  messages: number;
  reservations_active: number;
  links_pending: number;
}

export function getStats(db: Database.Database, at: string): StoreStats {
  const count = (sql: string, ...params: string[]): number =>
    (db.prepare(sql).get(...params) as { count: number }).count;

  return {
    projects: count('SELECT COUNT(*) AS count FROM projects'),
    agents: count('SELECT COUNT(*) AS count FROM agents WHERE deregistered_ts IS NULL'),
    messages: count('SELECT COUNT(*) AS count FROM messages'),
    reservations_active: count(
      'SELECT COUNT(*) AS count FROM file_reservations WHERE released_ts IS NULL AND expires_ts > ?',
      at
    ),
    links_pending: count(`SELECT COUNT(*) AS count FROM agent_links WHERE status = 'pending'`),
  };
}
