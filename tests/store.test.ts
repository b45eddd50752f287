import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { getNumberSetting, updateSetting, writeTransaction } from '../src/core/store.js';
import { readGlobalConfig, resolveDbPath, writeGlobalConfig } from '../src/core/config.js';
import { getAllSettings, getProjectBySlug, getSetting, getStats, setSetting } from '../src/db/queries.js';
import { ensureProject } from '../src/core/projects.js';
import { reserve } from '../src/core/reservations.js';
import { requestLink } from '../src/core/links.js';
import { DuplicateError, ValidationError } from '../src/core/errors.js';
import { now } from '../src/core/time.js';
import { addAgent, createTestStore, type TestStore } from './helpers.js';

describe('store', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore('store');
  });

  afterEach(() => {
    store.cleanup();
  });

  it('should enable foreign keys and WAL', () => {
    expect(store.db.pragma('foreign_keys', { simple: true })).toBe(1);
    expect(store.db.pragma('journal_mode', { simple: true })).toBe('wal');
  });

  describe('writeTransaction', () => {
    it('should roll back everything when the callback throws', () => {
      expect(() => writeTransaction(store.db, () => {
        ensureProject(store.db, '/repo/one');
        throw new Error('boom');
      })).toThrow('boom');

      expect(getProjectBySlug(store.db, 'repo-one')).toBeUndefined();
    });

    it('should surface unique-key failures as DuplicateError', () => {
      expect(() => writeTransaction(store.db, () => {
        store.db.prepare(`INSERT INTO settings (key, value) VALUES ('retention_days', '7')`).run();
      })).toThrow(DuplicateError);
      expect(getSetting(store.db, 'retention_days')).toBe('30');
    });
  });

  describe('settings', () => {
    it('should read numeric settings with a fallback', () => {
      expect(getNumberSetting(store.db, 'retention_days', 5)).toBe(30);
      expect(getNumberSetting(store.db, 'missing_key', 5)).toBe(5);
    });

    it('should reject a non-numeric stored value', () => {
      setSetting(store.db, 'retention_days', 'soon');
      expect(() => getNumberSetting(store.db, 'retention_days', 5)).toThrow(ValidationError);
    });

    it('should update known settings with dashed keys', () => {
      expect(updateSetting(store.db, 'retention-days', '14')).toBe('retention_days');
      expect(getAllSettings(store.db)).toEqual([
        { key: 'default_reservation_ttl_seconds', value: '3600' },
        { key: 'retention_days', value: '14' },
      ]);
    });

    it('should reject unknown keys and invalid values', () => {
      expect(() => updateSetting(store.db, 'stale-hours', '4')).toThrow(ValidationError);
      expect(() => updateSetting(store.db, 'retention_days', '0')).toThrow(ValidationError);
      expect(() => updateSetting(store.db, 'retention_days', 'ten')).toThrow(ValidationError);
    });

    it('should apply the default reservation TTL setting', () => {
      addAgent(store.db, '/repo/one', 'alice');
      updateSetting(store.db, 'default-reservation-ttl-seconds', '120');

      const reservation = reserve(store.db, { project: 'repo-one', name: 'alice', pathPattern: 'src/**' });

      expect(Date.parse(reservation.expires_ts) - Date.parse(reservation.created_ts)).toBe(120_000);
    });
  });

  describe('getStats', () => {
    it('should count live records', () => {
      addAgent(store.db, '/repo/one', 'alice');
      addAgent(store.db, '/repo/two', 'bob');
      reserve(store.db, { project: 'repo-one', name: 'alice', pathPattern: 'src/**' });
      requestLink(store.db, { from: { project: 'repo-one', name: 'alice' }, to: { project: 'repo-two', name: 'bob' } });

      expect(getStats(store.db, now())).toEqual({
        projects: 2,
        agents: 2,
        messages: 0,
        reservations_active: 1,
        links_pending: 1,
      });
    });
  });
});

describe('config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'switchboard-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should prefer an explicit path over the environment', () => {
    const explicit = path.join(tempDir, 'flag.db');
    const fromEnv = path.join(tempDir, 'env.db');

    expect(resolveDbPath(explicit, { SWITCHBOARD_DB: fromEnv })).toBe(explicit);
    expect(resolveDbPath(undefined, { SWITCHBOARD_DB: fromEnv })).toBe(fromEnv);
  });

  it('should read back a written config file', () => {
    const configPath = path.join(tempDir, 'nested', 'config.json');
    writeGlobalConfig({ version: 2, db_path: '/srv/switchboard.db' }, configPath);

    expect(readGlobalConfig(configPath)).toEqual({ version: 2, db_path: '/srv/switchboard.db' });
  });

  it('should return null when no config file exists', () => {
    expect(readGlobalConfig(path.join(tempDir, 'absent.json'))).toBeNull();
  });

  it('should reject a config file that is not an object', () => {
    const configPath = path.join(tempDir, 'config.json');
    fs.writeFileSync(configPath, '42');

    expect(() => readGlobalConfig(configPath)).toThrow('Invalid config file');
  });
});
