import fs from 'fs';
import path from 'path';
import os from 'os';

export interface GlobalConfig {
  version: number;
  db_path?: string;
}

const CONFIG_DIR = path.join(os.homedir(), '.config', 'switchboard');
const CONFIG_PATH = path.join(CONFIG_DIR, 'config.json');
const DEFAULT_DB_PATH = path.join(CONFIG_DIR, 'switchboard.db');

export const paths = {
  dir: CONFIG_DIR,
  config: CONFIG_PATH,
  db: DEFAULT_DB_PATH,
};

export function readGlobalConfig(configPath = CONFIG_PATH): GlobalConfig | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }
  const raw = fs.readFileSync(configPath, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error(`Invalid config file: ${configPath}`);
  }

  const version = 'version' in parsed && typeof parsed.version === 'number' ? parsed.version : 1;
  const dbPath = 'db_path' in parsed && typeof parsed.db_path === 'string' ? parsed.db_path : undefined;
  return { version, db_path: dbPath };
}

export function writeGlobalConfig(config: GlobalConfig, configPath = CONFIG_PATH): void {
  const dir = path.dirname(configPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf8');
}

/**
 * Resolve the database path.
 * Precedence: explicit flag, SWITCHBOARD_DB, config file db_path, default.
 */
export function resolveDbPath(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) {
    return path.resolve(explicit);
  }
  if (env.SWITCHBOARD_DB) {
    return path.resolve(env.SWITCHBOARD_DB);
  }
  const config = readGlobalConfig();
  if (config?.db_path) {
    return path.resolve(config.db_path);
  }
  return DEFAULT_DB_PATH;
}
