import { Command } from 'commander';
import Database from 'better-sqlite3';
import { resolveDbPath } from '../core/config.js';
import { isSwitchboardError } from '../core/errors.js';
import { openStore } from '../core/store.js';

export interface CommandContext {
  db: Database.Database;
  dbPath: string;
  jsonMode: boolean;
}

/**
 * Open the store for a command.
 * Honors the global --db flag, then SWITCHBOARD_DB, then the config file.
 */
export function getContext(cmd: Command): CommandContext {
  const opts = cmd.optsWithGlobals<{ db?: string; json?: boolean }>();
  const dbPath = resolveDbPath(opts.db);
  return {
    db: openStore(dbPath),
    dbPath,
    jsonMode: opts.json ?? false,
  };
}

/**
 * Parse a positive integer option value.
 */
export function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${flag} value: ${value}`);
  }
  return parsed;
}

/**
 * Format error message and exit.
 */
export function handleError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  if (isSwitchboardError(error)) {
    console.error(`Error [${error.code}]: ${message}`);
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}
