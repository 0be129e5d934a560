import type { LogEntry, MatchStartTime } from '@event-scoring/shared';
import type { Db } from '../utils/db.js';
import { runInTransaction, runQuery } from '../utils/db.js';
import { nowSeconds } from '../utils/time.js';

export const MATCH_START_TAG = 'match_start';

interface MatchStartRow {
  match_number: number;
  timestamp: number;
}

/**
 * Append an operational log entry. These are for reporting only, not for reconstruction.
 */
export function writeLogEntry(
  db: Db,
  tag: string,
  message: string,
  timestamp: number = nowSeconds()
): LogEntry {
  return runInTransaction(db, `write ${tag} log entry`, () => {
    db.prepare('INSERT INTO log (timestamp, tag, message) VALUES (?, ?, ?)').run(
      timestamp,
      tag,
      message
    );
    return { timestamp, tag, message };
  });
}

export function listLogEntries(db: Db, tag?: string): LogEntry[] {
  return runQuery(db, 'read the operational log', () => {
    if (tag) {
      return db
        .prepare<[string], LogEntry>(
          'SELECT timestamp, tag, message FROM log WHERE tag = ? ORDER BY rowid'
        )
        .all(tag);
    }
    return db.prepare<[], LogEntry>('SELECT timestamp, tag, message FROM log ORDER BY rowid').all();
  });
}

/**
 * Latest start time of every match, ordered by match number
 */
export function queryMatchStartTimes(db: Db): MatchStartTime[] {
  return runQuery(db, 'read match start times', () =>
    db
      .prepare<[string], MatchStartRow>(
        `SELECT CAST(message AS INTEGER) AS match_number, MAX(timestamp) AS timestamp
         FROM log
         WHERE tag = ?
         GROUP BY message
         ORDER BY CAST(message AS INTEGER)`
      )
      .all(MATCH_START_TAG)
      .map((row) => ({ matchNumber: row.match_number, timestamp: row.timestamp }))
  );
}
