import type Database from 'better-sqlite3';

const SCHEMA_SQL = `
-- Repository identities
CREATE TABLE IF NOT EXISTS projects (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  slug TEXT NOT NULL UNIQUE,             -- e.g., "users-dev-backend"
  human_key TEXT NOT NULL,               -- caller-supplied key (usually repo path)
  created_at TEXT NOT NULL               -- ISO-8601 UTC
);

CREATE INDEX IF NOT EXISTS idx_projects_human_key ON projects(human_key);

-- Multi-repository groupings
CREATE TABLE IF NOT EXISTS products (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  product_uid TEXT NOT NULL UNIQUE,      -- e.g., "prd-a1b2c3d4"
  name TEXT NOT NULL UNIQUE,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS product_project_links (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  product_id INTEGER NOT NULL REFERENCES products(id) ON DELETE CASCADE,
  project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  created_at TEXT NOT NULL,
  UNIQUE(product_id, project_id)
);

CREATE INDEX IF NOT EXISTS idx_product_project_links_project ON product_project_links(project_id);

-- Agents, scoped to one project
CREATE TABLE IF NOT EXISTS agents (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  program TEXT NOT NULL,
  model TEXT NOT NULL,
  task_description TEXT NOT NULL DEFAULT '',
  inception_ts TEXT NOT NULL,
  last_active_ts TEXT NOT NULL,
  attachments_policy TEXT NOT NULL DEFAULT 'auto',   -- auto | inline | file
  contact_policy TEXT NOT NULL DEFAULT 'auto',       -- open | auto | contacts_only | block_all
  deregistered_ts TEXT,                              -- soft delete, null if active
  UNIQUE(project_id, name)
);

CREATE INDEX IF NOT EXISTS idx_agents_project ON agents(project_id);

-- Messages (immutable after insert)
CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  sender_id INTEGER NOT NULL REFERENCES agents(id),
  thread_id TEXT,
  subject TEXT NOT NULL,
  body_md TEXT NOT NULL,
  importance TEXT NOT NULL DEFAULT 'normal',
  ack_required INTEGER NOT NULL DEFAULT 0,
  created_ts TEXT NOT NULL,
  attachments TEXT NOT NULL DEFAULT '[]'              -- JSON array of descriptors
);

CREATE INDEX IF NOT EXISTS idx_messages_project_created ON messages(project_id, created_ts);
CREATE INDEX IF NOT EXISTS idx_messages_sender ON messages(sender_id);
CREATE INDEX IF NOT EXISTS idx_messages_thread ON messages(thread_id);

CREATE TABLE IF NOT EXISTS message_recipients (
  message_id INTEGER NOT NULL REFERENCES messages(id) ON DELETE CASCADE,
  agent_id INTEGER NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
  kind TEXT NOT NULL DEFAULT 'to',       -- to | cc
  read_ts TEXT,                          -- set once
  ack_ts TEXT,                           -- set once
  PRIMARY KEY (message_id, agent_id)
);

CREATE INDEX IF NOT EXISTS idx_message_recipients_agent ON message_recipients(agent_id);

-- Path-pattern claims
CREATE TABLE IF NOT EXISTS file_reservations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  agent_id INTEGER NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
  path_pattern TEXT NOT NULL,
  exclusive INTEGER NOT NULL DEFAULT 1,
  reason TEXT NOT NULL DEFAULT '',
  created_ts TEXT NOT NULL,
  expires_ts TEXT NOT NULL,
  released_ts TEXT,                      -- null while held
  CHECK (expires_ts > created_ts)
);

CREATE INDEX IF NOT EXISTS idx_file_reservations_active
  ON file_reservations(project_id, expires_ts) WHERE released_ts IS NULL;
CREATE INDEX IF NOT EXISTS idx_file_reservations_agent ON file_reservations(agent_id);

-- Directed contact links
CREATE TABLE IF NOT EXISTS agent_links (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  a_project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  a_agent_id INTEGER NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
  b_project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  b_agent_id INTEGER NOT NULL REFERENCES agents(id) ON DELETE CASCADE,
  status TEXT NOT NULL DEFAULT 'pending',   -- pending | approved | blocked
  reason TEXT NOT NULL DEFAULT '',
  created_ts TEXT NOT NULL,
  updated_ts TEXT NOT NULL,
  expires_ts TEXT,
  UNIQUE(a_project_id, a_agent_id, b_project_id, b_agent_id)
);

CREATE INDEX IF NOT EXISTS idx_agent_links_b ON agent_links(b_agent_id);

-- Sibling project suggestions (undirected, lower id first)
CREATE TABLE IF NOT EXISTS project_sibling_suggestions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_a_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  project_b_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
  score REAL NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'suggested',  -- suggested | confirmed | dismissed
  rationale TEXT NOT NULL DEFAULT '',
  created_ts TEXT NOT NULL,
  evaluated_ts TEXT NOT NULL,
  confirmed_ts TEXT,
  dismissed_ts TEXT,
  UNIQUE(project_a_id, project_b_id),
  CHECK (project_a_id < project_b_id)
);

-- Runtime settings
CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

const DEFAULT_SETTINGS_SQL = `
INSERT OR IGNORE INTO settings (key, value) VALUES ('default_reservation_ttl_seconds', '3600');
INSERT OR IGNORE INTO settings (key, value) VALUES ('retention_days', '30');
`;

/**
 * Initialize schema in database.
 * Safe to call multiple times (uses IF NOT EXISTS).
 */
export function initSchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
  db.exec(DEFAULT_SETTINGS_SQL);
}

/**
 * Check if schema exists in database.
 */
export function schemaExists(db: Database.Database): boolean {
  const result = db.prepare(`
    SELECT name FROM sqlite_master
    WHERE type='table' AND name='agents'
  `).get();

  return result !== undefined;
}
