import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { APP_VERSION } from '../config.js';
import { writeAuditEntry } from './audit.js';
import type { Db } from '../utils/db.js';
import { runInTransaction, runQuery } from '../utils/db.js';
import { PersistenceError, describeError } from '../utils/errors.js';
import { formatDateKey } from '../utils/time.js';

export const SCHEMA_VERSION = 3;

const REQUIRED_TABLES = ['teams', 'scores', 'scoresheets', 'audit', 'log', 'meta'] as const;

// Pre-provisioned event databases are named EVENTCODE-YYYYMMDD.db
const PRECREATED_DB_PATTERN = /^([a-zA-Z][a-zA-Z0-9]+)-(\d{8})\.db$/;

export interface OpenStoreOptions {
  directory: string;
  filename?: string; // explicit database file, or ':memory:'
  today?: Date;
  appVersion?: string;
}

/**
 * An open event database. Pass it to every collaborator that reads or writes event state.
 */
export interface ScoreStore {
  db: Db;
  filename: string;
  created: boolean;
}

function isCalendarDate(dateKey: string): boolean {
  const year = Number(dateKey.slice(0, 4));
  const month = Number(dateKey.slice(4, 6));
  const day = Number(dateKey.slice(6, 8));
  const date = new Date(year, month - 1, day);
  return date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day;
}

/**
 * Find the pre-provisioned event database closest to today without being in the past
 */
export function findEventDatabase(directory: string, today: Date = new Date()): string | null {
  const todayKey = formatDateKey(today);
  let closestFile: string | null = null;
  let closestKey: string | null = null;

  for (const filename of fs.readdirSync(directory)) {
    const match = PRECREATED_DB_PATTERN.exec(filename);
    if (!match) continue;

    const dateKey = match[2];
    if (!isCalendarDate(dateKey) || dateKey < todayKey) continue;

    if (closestKey === null || dateKey < closestKey) {
      closestKey = dateKey;
      closestFile = filename;
    }
  }

  return closestFile;
}

export function defaultEventFilename(today: Date = new Date()): string {
  return `${formatDateKey(today)}-event.db`;
}

function listTables(db: Db): string[] {
  return db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
    .all()
    .map((row) => row.name);
}

function createTables(db: Db): void {
  db.exec(`
    CREATE TABLE teams (teamnumber INTEGER NOT NULL UNIQUE, name TEXT NOT NULL, pit INTEGER NOT NULL DEFAULT 0);
    CREATE TABLE scores (slug TEXT NOT NULL UNIQUE, teamnumber INTEGER NOT NULL, round INTEGER NOT NULL, score INTEGER NOT NULL, comments TEXT NOT NULL DEFAULT '');
    CREATE TABLE audit (timestamp REAL NOT NULL, tag TEXT NOT NULL, data TEXT NOT NULL);
    CREATE TABLE log (timestamp REAL NOT NULL, tag TEXT NOT NULL, message TEXT NOT NULL);
    CREATE TABLE scoresheets (slug TEXT NOT NULL UNIQUE, teamnumber INTEGER NOT NULL, round INTEGER NOT NULL, scoresheet TEXT NOT NULL);
    CREATE TABLE meta (key TEXT NOT NULL UNIQUE, value TEXT);
  `);
  db.pragma('application_id = 0');
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}

export function getMeta(db: Db, key: string): string | null {
  return runQuery(db, `read meta ${key}`, () => {
    const row = db
      .prepare<[string], { value: string | null }>('SELECT value FROM meta WHERE key = ?')
      .get(key);
    return row?.value ?? null;
  });
}

export function setMeta(db: Db, key: string, value: string): void {
  runInTransaction(db, `write meta ${key}`, () => {
    db.prepare(
      'INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
    ).run(key, value);
  });
}

/**
 * Open the event database, creating and initializing it when it is empty
 */
export function openStore(options: OpenStoreOptions): ScoreStore {
  const today = options.today ?? new Date();
  const appVersion = options.appVersion ?? APP_VERSION;
  let filename: string;
  try {
    filename =
      options.filename ??
      findEventDatabase(options.directory, today) ??
      defaultEventFilename(today);
  } catch (error) {
    throw new PersistenceError(
      `Cannot open event database in ${options.directory}: ${describeError(error)}`,
      { cause: error }
    );
  }
  const target = filename === ':memory:' ? filename : path.resolve(options.directory, filename);

  let db: Db;
  try {
    db = new Database(target);
    // One writer per event database, across processes as well
    db.pragma('locking_mode = EXCLUSIVE');
  } catch (error) {
    throw new PersistenceError(`Cannot open event database ${target}: ${describeError(error)}`, {
      cause: error,
    });
  }

  try {
    const tables = listTables(db);
    const created = tables.length === 0;

    if (created) {
      runInTransaction(db, 'initialize the event database', () => {
        createTables(db);
        setMeta(db, 'schema_version', String(SCHEMA_VERSION));
        setMeta(db, 'created_at', today.toISOString());
        writeAuditEntry(db, { tag: 'db_created', appVersion, schemaVersion: SCHEMA_VERSION });
      });
    } else {
      const missing = REQUIRED_TABLES.filter((table) => !tables.includes(table));
      if (missing.length > 0) {
        throw new PersistenceError(
          `Event database ${target} does not match the expected schema (missing: ${missing.join(', ')})`
        );
      }
      const schemaVersion = Number(db.pragma('user_version', { simple: true }));
      runInTransaction(db, 'record database open', () => {
        writeAuditEntry(db, { tag: 'db_opened', appVersion, schemaVersion });
      });
    }

    console.log(`[store] ${created ? 'Created' : 'Opened'} event database ${target}`);
    return { db, filename: target, created };
  } catch (error) {
    db.close();
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(`Cannot open event database ${target}`, { cause: error });
  }
}

/**
 * Record the close in the audit trail and release the connection. Valid exactly once.
 */
export function closeStore(store: ScoreStore): void {
  const { db } = store;
  runInTransaction(db, 'close the event database', () => {
    writeAuditEntry(db, { tag: 'db_closed' });
  });
  db.close();
  console.log(`[store] Closed event database ${store.filename}`);
}
