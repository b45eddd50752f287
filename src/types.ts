/**
 * Who may open a conversation with an agent from another project.
 */
export type ContactPolicy = 'open' | 'auto' | 'contacts_only' | 'block_all';

/**
 * How an agent prefers to receive attachments.
 */
export type AttachmentsPolicy = 'auto' | 'inline' | 'file';

export type Importance = 'low' | 'normal' | 'high' | 'urgent';

export type RecipientKind = 'to' | 'cc';

export type LinkStatus = 'pending' | 'approved' | 'blocked';

export type SiblingStatus = 'suggested' | 'confirmed' | 'dismissed';

export type AgentState = 'active' | 'deregistered';

export type ReservationState = 'active' | 'released' | 'expired';

/**
 * Repository identity.
 * Stored in projects table.
 */
export interface Project {
  id: number;
  slug: string;               // e.g., "users-dev-backend"
  human_key: string;          // e.g., absolute repo path as given by the caller
  created_at: string;         // ISO-8601 UTC
}

/**
 * Logical grouping of projects.
 * Stored in products table.
 */
export interface Product {
  id: number;
  product_uid: string;        // e.g., "prd-x9y8z7w6"
  name: string;
  created_at: string;
}

/**
 * Named actor scoped to one project.
 */
export interface Agent {
  id: number;
  project_id: number;
  name: string;               // e.g., "GreenCastle"
  program: string;            // e.g., "codex-cli"
  model: string;
  task_description: string;
  inception_ts: string;
  last_active_ts: string;     // touched on every action by the agent
  attachments_policy: AttachmentsPolicy;
  contact_policy: ContactPolicy;
  deregistered_ts: string | null;
  state: AgentState;          // derived from deregistered_ts
}

/**
 * Raw agent row from database.
 */
export type AgentRow = Omit<Agent, 'state'>;

/**
 * Attachment descriptor. Stored inside messages.attachments as JSON.
 */
export type Attachment =
  | { kind: 'file'; id: string; path: string; media_type: string; bytes: number; sha1?: string }
  | { kind: 'inline'; id: string; media_type: string; data_uri: string }
  | { kind: 'link'; id: string; url: string };

/**
 * Unit of communication. Immutable once inserted.
 */
export interface Message {
  id: number;
  project_id: number;
  sender_id: number;
  thread_id: string | null;
  subject: string;
  body_md: string;
  importance: Importance;
  ack_required: boolean;
  created_ts: string;
  attachments: Attachment[];
}

/**
 * Raw message row from database.
 * ack_required stored as 0/1, attachments as JSON string.
 */
export interface MessageRow {
  id: number;
  project_id: number;
  sender_id: number;
  thread_id: string | null;
  subject: string;
  body_md: string;
  importance: Importance;
  ack_required: number;
  created_ts: string;
  attachments: string;
}

export interface MessageRecipient {
  message_id: number;
  agent_id: number;
  kind: RecipientKind;
  read_ts: string | null;
  ack_ts: string | null;
}

/**
 * Recipient row joined with the agent it points at.
 */
export interface RecipientWithAgent extends MessageRecipient {
  agent_name: string;
  project_id: number;
}

/**
 * Claim on a path pattern within a project.
 */
export interface FileReservation {
  id: number;
  project_id: number;
  agent_id: number;
  path_pattern: string;
  exclusive: boolean;
  reason: string;
  created_ts: string;
  expires_ts: string;
  released_ts: string | null;
  state: ReservationState;    // derived against read time
}

/**
 * Raw reservation row from database.
 */
export interface FileReservationRow {
  id: number;
  project_id: number;
  agent_id: number;
  path_pattern: string;
  exclusive: number;
  reason: string;
  created_ts: string;
  expires_ts: string;
  released_ts: string | null;
}

export interface ReservationWithAgent extends FileReservation {
  agent_name: string;
}

/**
 * Directed contact link from agent A to agent B.
 */
export interface AgentLink {
  id: number;
  a_project_id: number;
  a_agent_id: number;
  b_project_id: number;
  b_agent_id: number;
  status: LinkStatus;
  reason: string;
  created_ts: string;
  updated_ts: string;
  expires_ts: string | null;
}

/**
 * Undirected sibling pair; project_a_id is always the lower id.
 */
export interface ProjectSiblingSuggestion {
  id: number;
  project_a_id: number;
  project_b_id: number;
  score: number;
  status: SiblingStatus;
  rationale: string;
  created_ts: string;
  evaluated_ts: string;
  confirmed_ts: string | null;
  dismissed_ts: string | null;
}

/**
 * Runtime setting.
 * Stored in settings table.
 */
export interface SettingEntry {
  key: string;
  value: string;
}

/**
 * Agent address: bare name (sender's project) or "Name@project-slug".
 */
export interface AgentAddress {
  project: string | null;
  name: string;
}

/**
 * Agent identified by project slug and name.
 */
export interface AgentRef {
  project: string;
  name: string;
}

/**
 * Query options for inbox retrieval.
 */
export interface InboxQueryOptions {
  limit?: number;             // max messages to return (default 20)
  unreadOnly?: boolean;
  urgentOnly?: boolean;       // importance high or urgent
  since?: string;             // ISO timestamp, exclusive
}

export interface InboxMessage extends Message {
  sender_name: string;
  kind: RecipientKind;
  read_ts: string | null;
  ack_ts: string | null;
}

export interface OutboxMessage extends Message {
  recipients: string[];
}
