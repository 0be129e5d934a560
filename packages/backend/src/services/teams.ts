import type { TeamRecord } from '@event-scoring/shared';
import { writeAuditEntry } from './audit.js';
import { deleteScoresForTeam } from './scores.js';
import { deleteScoresheetsForTeam } from './scoresheets.js';
import type { Db } from '../utils/db.js';
import { runInTransaction, runQuery } from '../utils/db.js';

interface TeamRow {
  teamnumber: number;
  name: string;
  pit: number | null;
}

function rowToTeam(row: TeamRow): TeamRecord {
  return {
    teamNumber: row.teamnumber,
    name: row.name,
    pit: row.pit ?? 0,
  };
}

export function listTeams(db: Db): TeamRecord[] {
  return runQuery(db, 'load teams', () =>
    db
      .prepare<[], TeamRow>('SELECT teamnumber, name, pit FROM teams ORDER BY teamnumber')
      .all()
      .map(rowToTeam)
  );
}

export function getTeamByNumber(db: Db, teamNumber: number): TeamRecord | null {
  return runQuery(db, `load team ${teamNumber}`, () => {
    const row = db
      .prepare<[number], TeamRow>('SELECT teamnumber, name, pit FROM teams WHERE teamnumber = ?')
      .get(teamNumber);
    return row ? rowToTeam(row) : null;
  });
}

/**
 * Create a team, or replace the name and pit of an existing one.
 * This is the only rename path; both cases are audited.
 */
export function upsertTeam(db: Db, teamNumber: number, name: string, pit: number): TeamRecord {
  return runInTransaction(db, `save team ${teamNumber}`, () => {
    const existing = getTeamByNumber(db, teamNumber);

    db.prepare(
      `INSERT INTO teams (teamnumber, name, pit) VALUES (?, ?, ?)
       ON CONFLICT(teamnumber) DO UPDATE SET name = excluded.name, pit = excluded.pit`
    ).run(teamNumber, name, pit);

    if (existing) {
      writeAuditEntry(db, {
        tag: 'team_update',
        teamNumber,
        oldName: existing.name,
        newName: name,
        oldPit: existing.pit,
        newPit: pit,
      });
    } else {
      writeAuditEntry(db, { tag: 'team_add', teamNumber, name, pit });
    }

    return { teamNumber, name, pit };
  });
}

/**
 * Permanently delete a team with its scores and scoresheets, as one transaction
 */
export function deleteTeam(db: Db, teamNumber: number): boolean {
  return runInTransaction(db, `delete team ${teamNumber}`, () => {
    const existing = getTeamByNumber(db, teamNumber);
    if (!existing) {
      return false;
    }

    writeAuditEntry(db, {
      tag: 'team_delete',
      teamNumber,
      name: existing.name,
      pit: existing.pit,
    });
    db.prepare('DELETE FROM teams WHERE teamnumber = ?').run(teamNumber);

    deleteScoresForTeam(db, teamNumber);
    deleteScoresheetsForTeam(db, teamNumber);

    return true;
  });
}
