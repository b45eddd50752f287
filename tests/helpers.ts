import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { openStore } from '../src/core/store.js';
import { ensureProject } from '../src/core/projects.js';
import { registerAgent } from '../src/core/agents.js';
import type { Agent, ContactPolicy } from '../src/types.js';

export interface TestStore {
  db: Database.Database;
  dbPath: string;
  cleanup: () => void;
}

/**
 * Open a fresh store in a temp directory.
 */
export function createTestStore(prefix: string): TestStore {
  const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), `switchboard-${prefix}-`));
  const dbPath = path.join(tempDir, 'test.db');
  const db = openStore(dbPath);

  return {
    db,
    dbPath,
    cleanup: () => {
      if (db.open) db.close();
      fs.rmSync(tempDir, { recursive: true, force: true });
    },
  };
}

/**
 * Register an agent, creating its project from `projectKey` if needed.
 * "/repo/one" becomes project "repo-one".
 */
export function addAgent(
  db: Database.Database,
  projectKey: string,
  name: string,
  contactPolicy?: ContactPolicy
): Agent {
  const project = ensureProject(db, projectKey);
  return registerAgent(db, {
    project: project.slug,
    name,
    program: 'test-cli',
    model: 'test-model',
    contactPolicy,
  });
}
