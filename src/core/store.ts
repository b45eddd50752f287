import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { initSchema } from '../db/schema.js';
import { getSetting, setSetting } from '../db/queries.js';
import { DuplicateError, isUniqueViolation, ValidationError } from './errors.js';

/**
 * Open the shared store, creating the file and schema if needed.
 */
export function openStore(dbPath: string): Database.Database {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable foreign keys (recipient rows cascade with their message)
  db.pragma('foreign_keys = ON');

  // Enable WAL mode for better concurrency
  db.pragma('journal_mode = WAL');

  // Set busy timeout for multi-agent resilience
  db.pragma('busy_timeout = 5000');

  initSchema(db);
  return db;
}

/**
 * Run `fn` in a write transaction taken before its first read (BEGIN IMMEDIATE),
 * so concurrent processes serialise check-then-insert sequences.
 * Any thrown error rolls the whole transaction back; unique-key failures
 * surface as DuplicateError.
 */
export function writeTransaction<T>(db: Database.Database, fn: () => T): T {
  const txn = db.transaction(fn);
  try {
    return db.inTransaction ? txn() : txn.immediate();
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateError(error.message, { sqlite_code: error.code });
    }
    throw error;
  }
}

/**
 * Read a numeric setting.
 * @throws ValidationError if the stored value is not a number
 */
export function getNumberSetting(db: Database.Database, key: string, fallback: number): number {
  const raw = getSetting(db, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Setting ${key} is not a number: ${raw}`, 'INVALID_SETTING');
  }
  return value;
}

export const SETTING_KEYS = ['default_reservation_ttl_seconds', 'retention_days'] as const;
export type SettingKey = typeof SETTING_KEYS[number];

/**
 * Validate and store a known setting.
 * Keys accept dashes (retention-days) or underscores.
 */
export function updateSetting(db: Database.Database, key: string, value: string): SettingKey {
  const normalizedKey = key.replace(/-/g, '_');
  const known = SETTING_KEYS.find(k => k === normalizedKey);
  if (!known) {
    throw new ValidationError(`Unknown setting: ${key}`, 'UNKNOWN_SETTING');
  }
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new ValidationError(`Setting ${known} must be a positive integer: ${value}`, 'INVALID_SETTING');
  }
  setSetting(db, known, String(num));
  return known;
}
