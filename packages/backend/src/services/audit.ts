import type { AuditEntry, AuditEvent, AuditQuery, RoundNumber } from '@event-scoring/shared';
import { isAuditTag, isRoundNumber } from '@event-scoring/shared';
import type { Db } from '../utils/db.js';
import { runQuery } from '../utils/db.js';
import { PersistenceError } from '../utils/errors.js';
import { nowSeconds } from '../utils/time.js';

interface AuditRow {
  timestamp: number;
  tag: string;
  data: string;
}

type PayloadValue = string | number | null;

/**
 * Stored payload fields for an event, in the snake_case layout offline tools read
 */
function toPayload(event: AuditEvent): Record<string, PayloadValue> {
  switch (event.tag) {
    case 'db_created':
    case 'db_opened':
      return { app_version: event.appVersion, schema_version: event.schemaVersion };
    case 'db_closed':
      return {};
    case 'team_add':
    case 'team_delete':
      return { teamnumber: event.teamNumber, name: event.name, pit: event.pit };
    case 'team_update':
      return {
        teamnumber: event.teamNumber,
        old_name: event.oldName,
        new_name: event.newName,
        old_pit: event.oldPit,
        new_pit: event.newPit,
      };
    case 'score_update':
      return {
        teamnumber: event.teamNumber,
        round: event.round,
        old_score: event.oldScore,
        new_score: event.newScore,
      };
    case 'score_delete':
      return {
        teamnumber: event.teamNumber,
        round: event.round,
        old_score: event.oldScore,
        new_score: null,
      };
    case 'scoresheet_update':
      return {
        teamnumber: event.teamNumber,
        round: event.round,
        old_scoresheet: event.oldScoresheet,
        new_scoresheet: event.newScoresheet,
      };
    case 'scoresheet_delete':
      return {
        teamnumber: event.teamNumber,
        round: event.round,
        old_scoresheet: event.oldScoresheet,
        new_scoresheet: null,
      };
  }
}

/**
 * Append an audit entry. Callers run this inside the transaction of the write it describes.
 */
export function writeAuditEntry(
  db: Db,
  event: AuditEvent,
  timestamp: number = nowSeconds()
): AuditEntry {
  const data = { ...toPayload(event), timestamp, tag: event.tag };

  db.prepare('INSERT INTO audit (timestamp, tag, data) VALUES (?, ?, ?)').run(
    timestamp,
    event.tag,
    JSON.stringify(data)
  );

  return { ...event, timestamp };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed field access for a decoded payload
 */
class PayloadReader {
  constructor(
    private readonly data: Record<string, unknown>,
    private readonly tag: string
  ) {}

  private fail(key: string, expected: string): never {
    throw new PersistenceError(`Audit entry ${this.tag} has invalid field ${key}: expected ${expected}`);
  }

  number(key: string): number {
    const value = this.data[key];
    return typeof value === 'number' ? value : this.fail(key, 'a number');
  }

  nullableNumber(key: string): number | null {
    const value = this.data[key];
    if (value === null || value === undefined) return null;
    return typeof value === 'number' ? value : this.fail(key, 'a number or null');
  }

  string(key: string): string {
    const value = this.data[key];
    return typeof value === 'string' ? value : this.fail(key, 'a string');
  }

  nullableString(key: string): string | null {
    const value = this.data[key];
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : this.fail(key, 'a string or null');
  }

  round(key: string): RoundNumber {
    const value = this.data[key];
    return isRoundNumber(value) ? value : this.fail(key, 'a round number');
  }
}

function rowToAuditEntry(row: AuditRow): AuditEntry {
  const tag = row.tag;
  const data: unknown = JSON.parse(row.data);
  if (!isRecord(data) || !isAuditTag(tag)) {
    throw new PersistenceError(`Unreadable audit entry with tag ${tag}`);
  }

  const read = new PayloadReader(data, tag);
  const timestamp = row.timestamp;

  switch (tag) {
    case 'db_created':
    case 'db_opened':
      return {
        tag,
        appVersion: read.string('app_version'),
        schemaVersion: read.number('schema_version'),
        timestamp,
      };
    case 'db_closed':
      return { tag, timestamp };
    case 'team_add':
    case 'team_delete':
      return {
        tag,
        teamNumber: read.number('teamnumber'),
        name: read.string('name'),
        pit: read.nullableNumber('pit') ?? 0,
        timestamp,
      };
    case 'team_update':
      return {
        tag,
        teamNumber: read.number('teamnumber'),
        oldName: read.string('old_name'),
        newName: read.string('new_name'),
        oldPit: read.nullableNumber('old_pit') ?? 0,
        newPit: read.nullableNumber('new_pit') ?? 0,
        timestamp,
      };
    case 'score_update':
      return {
        tag,
        teamNumber: read.number('teamnumber'),
        round: read.round('round'),
        oldScore: read.nullableNumber('old_score'),
        newScore: read.number('new_score'),
        timestamp,
      };
    case 'score_delete':
      return {
        tag,
        teamNumber: read.number('teamnumber'),
        round: read.round('round'),
        oldScore: read.number('old_score'),
        timestamp,
      };
    case 'scoresheet_update':
      return {
        tag,
        teamNumber: read.number('teamnumber'),
        round: read.round('round'),
        oldScoresheet: read.nullableString('old_scoresheet'),
        newScoresheet: read.string('new_scoresheet'),
        timestamp,
      };
    case 'scoresheet_delete':
      return {
        tag,
        teamNumber: read.number('teamnumber'),
        round: read.round('round'),
        oldScoresheet: read.string('old_scoresheet'),
        timestamp,
      };
  }
}

/**
 * Audit entries in the order they were written. With a limit, the most recent entries are kept.
 */
export function listAuditEntries(db: Db, query: AuditQuery = {}): AuditEntry[] {
  return runQuery(db, 'read the audit log', () => {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (query.tag) {
      conditions.push('tag = ?');
      params.push(query.tag);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    let sql = `SELECT rowid AS id, timestamp, tag, data FROM audit ${where} ORDER BY rowid`;

    if (query.limit !== undefined) {
      sql = `SELECT * FROM (SELECT rowid AS id, timestamp, tag, data FROM audit ${where} ORDER BY rowid DESC LIMIT ?) ORDER BY id`;
      params.push(query.limit);
    }

    const rows = db.prepare<Array<string | number>, AuditRow>(sql).all(...params);
    return rows.map(rowToAuditEntry);
  });
}
