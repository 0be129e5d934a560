import type { RoundNumber, ScoresheetRecord } from '@event-scoring/shared';
import { isRoundNumber } from '@event-scoring/shared';
import { writeAuditEntry } from './audit.js';
import { scoreSlug } from './scores.js';
import type { Db } from '../utils/db.js';
import { runInTransaction, runQuery } from '../utils/db.js';
import { PersistenceError } from '../utils/errors.js';

interface ScoresheetRow {
  teamnumber: number;
  round: number;
  scoresheet: string;
}

function rowToScoresheet(row: ScoresheetRow): ScoresheetRecord {
  if (!isRoundNumber(row.round)) {
    throw new PersistenceError(
      `Scoresheet for team ${row.teamnumber} has invalid round ${row.round}`
    );
  }
  return { teamNumber: row.teamnumber, round: row.round, scoresheet: row.scoresheet };
}

export function listScoresheets(db: Db): ScoresheetRecord[] {
  return runQuery(db, 'load scoresheets', () =>
    db
      .prepare<[], ScoresheetRow>(
        'SELECT teamnumber, round, scoresheet FROM scoresheets ORDER BY teamnumber, round'
      )
      .all()
      .map(rowToScoresheet)
  );
}

export function getScoresheet(
  db: Db,
  teamNumber: number,
  round: RoundNumber
): ScoresheetRecord | null {
  return runQuery(db, `load scoresheet ${scoreSlug(teamNumber, round)}`, () => {
    const row = db
      .prepare<[string], ScoresheetRow>(
        'SELECT teamnumber, round, scoresheet FROM scoresheets WHERE slug = ?'
      )
      .get(scoreSlug(teamNumber, round));
    return row ? rowToScoresheet(row) : null;
  });
}

export function upsertScoresheet(
  db: Db,
  teamNumber: number,
  round: RoundNumber,
  scoresheet: string
): ScoresheetRecord {
  return runInTransaction(db, `save scoresheet ${scoreSlug(teamNumber, round)}`, () => {
    const previous = getScoresheet(db, teamNumber, round);

    db.prepare(
      `INSERT INTO scoresheets (slug, teamnumber, round, scoresheet) VALUES (?, ?, ?, ?)
       ON CONFLICT(slug) DO UPDATE SET scoresheet = excluded.scoresheet`
    ).run(scoreSlug(teamNumber, round), teamNumber, round, scoresheet);

    writeAuditEntry(db, {
      tag: 'scoresheet_update',
      teamNumber,
      round,
      oldScoresheet: previous ? previous.scoresheet : null,
      newScoresheet: scoresheet,
    });

    return { teamNumber, round, scoresheet };
  });
}

export function deleteScoresheetsForTeam(db: Db, teamNumber: number): number {
  return runInTransaction(db, `delete scoresheets for team ${teamNumber}`, () => {
    const sheets = db
      .prepare<[number], ScoresheetRow>(
        'SELECT teamnumber, round, scoresheet FROM scoresheets WHERE teamnumber = ? ORDER BY round'
      )
      .all(teamNumber)
      .map(rowToScoresheet);
    const remove = db.prepare('DELETE FROM scoresheets WHERE slug = ?');

    for (const sheet of sheets) {
      writeAuditEntry(db, {
        tag: 'scoresheet_delete',
        teamNumber,
        round: sheet.round,
        oldScoresheet: sheet.scoresheet,
      });
      remove.run(scoreSlug(teamNumber, sheet.round));
    }

    return sheets.length;
  });
}
