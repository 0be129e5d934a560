import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig, loadSyncSettings, parseSyncSettings } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ SCORING_DATA_DIR: '/srv/event' });

    expect(config).toEqual({
      port: 3000,
      dataDir: path.resolve('/srv/event'),
      dbFile: undefined,
      syncSettingsPath: path.resolve('/srv/event', 'sync.json'),
      syncTimeoutMs: 5000,
      syncMaxPending: 1000,
      corsOrigins: ['http://localhost:3000'],
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SCORING_PORT: '8080',
      SCORING_DATA_DIR: '/srv/event',
      SCORING_DB_FILE: 'DEMO-20240511.db',
      SCORING_SYNC_SETTINGS: 'reflector.json',
      SCORING_SYNC_TIMEOUT_MS: '2500',
      SCORING_SYNC_MAX_PENDING: '50',
      SCORING_CORS_ORIGINS: 'http://scoring.local, http://display.local:8080,',
    });

    expect(config).toMatchObject({
      port: 8080,
      dbFile: 'DEMO-20240511.db',
      syncSettingsPath: path.resolve('/srv/event', 'reflector.json'),
      syncTimeoutMs: 2500,
      syncMaxPending: 50,
      corsOrigins: ['http://scoring.local', 'http://display.local:8080'],
    });
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ SCORING_PORT: 'eighty' })).toThrow(
      'SCORING_PORT must be an integer of at least 1, got "eighty"'
    );
    expect(() => loadConfig({ SCORING_SYNC_TIMEOUT_MS: '0' })).toThrow(/SCORING_SYNC_TIMEOUT_MS/);
  });
});

describe('sync settings', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = null;
    }
  });

  it('maps the sync.json keys to credentials', () => {
    expect(
      parseSyncSettings({
        sync_url: 'https://reflector.test/api',
        event_code: 'DEMO',
        apikey: 'test-secret',
      })
    ).toEqual({ syncUrl: 'https://reflector.test/api', eventCode: 'DEMO', apiKey: 'test-secret' });
  });

  it('rejects incomplete settings', () => {
    expect(() => parseSyncSettings({ sync_url: 'https://reflector.test/api' })).toThrow(
      'Sync settings are missing "event_code"'
    );
    expect(() => parseSyncSettings(['DEMO'])).toThrow('Sync settings are missing "sync_url"');
    expect(() => parseSyncSettings(null)).toThrow('Sync settings must be a JSON object');
  });

  it('returns null when the settings file does not exist', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'event-config-'));

    expect(loadSyncSettings(path.join(tmpDir, 'sync.json'))).toBeNull();
  });

  it('loads the settings file', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'event-config-'));
    const file = path.join(tmpDir, 'sync.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ sync_url: 'https://reflector.test/api', event_code: 'DEMO', apikey: 'test-secret' })
    );

    expect(loadSyncSettings(file)).toEqual({
      syncUrl: 'https://reflector.test/api',
      eventCode: 'DEMO',
      apiKey: 'test-secret',
    });
  });
});
