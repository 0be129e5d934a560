import fs from 'node:fs';
import path from 'node:path';
import type { ReflectorCredentials } from '@event-scoring/shared';

export const APP_VERSION = '1.0.0';

export interface AppConfig {
  port: number;
  dataDir: string;
  dbFile?: string;
  syncSettingsPath: string;
  syncTimeoutMs: number;
  syncMaxPending: number;
  corsOrigins: string[];
}

type EnvSource = Record<string, string | undefined>;

function readInteger(env: EnvSource, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer of at least ${min}, got "${raw}"`);
  }
  return value;
}

function readList(env: EnvSource, key: string, fallback: string[]): string[] {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Read settings from the environment (.env is loaded by the server entry point)
 */
export function loadConfig(env: EnvSource = process.env): AppConfig {
  const dataDir = path.resolve(env.SCORING_DATA_DIR || process.cwd());
  const dbFile = env.SCORING_DB_FILE?.trim() || undefined;

  return {
    port: readInteger(env, 'SCORING_PORT', 3000, 1),
    dataDir,
    dbFile,
    syncSettingsPath: path.resolve(dataDir, env.SCORING_SYNC_SETTINGS || 'sync.json'),
    syncTimeoutMs: readInteger(env, 'SCORING_SYNC_TIMEOUT_MS', 5000, 1),
    syncMaxPending: readInteger(env, 'SCORING_SYNC_MAX_PENDING', 1000, 1),
    corsOrigins: readList(env, 'SCORING_CORS_ORIGINS', ['http://localhost:3000']),
  };
}

/**
 * Parse reflector settings in the sync.json layout: { sync_url, event_code, apikey }
 */
export function parseSyncSettings(raw: unknown): ReflectorCredentials {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('Sync settings must be a JSON object');
  }

  const settings = new Map<string, unknown>(Object.entries(raw));
  const read = (key: string): string => {
    const value = settings.get(key);
    if (typeof value !== 'string' || value.trim() === '') {
      throw new Error(`Sync settings are missing "${key}"`);
    }
    return value.trim();
  };

  return {
    syncUrl: read('sync_url'),
    eventCode: read('event_code'),
    apiKey: read('apikey'),
  };
}

/**
 * Load reflector credentials from disk, or null when the file does not exist
 */
export function loadSyncSettings(filePath: string): ReflectorCredentials | null {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  return parseSyncSettings(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}
