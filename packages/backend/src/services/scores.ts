import type { RoundNumber, ScoreRecord } from '@event-scoring/shared';
import { isRoundNumber } from '@event-scoring/shared';
import { writeAuditEntry } from './audit.js';
import type { Db } from '../utils/db.js';
import { runInTransaction, runQuery } from '../utils/db.js';
import { PersistenceError } from '../utils/errors.js';

interface ScoreRow {
  teamnumber: number;
  round: number;
  score: number;
  comments: string | null;
}

function rowToScore(row: ScoreRow): ScoreRecord {
  if (!isRoundNumber(row.round)) {
    throw new PersistenceError(`Score for team ${row.teamnumber} has invalid round ${row.round}`);
  }
  return {
    teamNumber: row.teamnumber,
    round: row.round,
    score: row.score,
    comments: row.comments ?? '',
  };
}

/**
 * Upsert key of a round score (and of its scoresheet)
 */
export function scoreSlug(teamNumber: number, round: RoundNumber): string {
  return `${teamNumber}-${round}`;
}

export function listScores(db: Db): ScoreRecord[] {
  return runQuery(db, 'load scores', () =>
    db
      .prepare<[], ScoreRow>(
        'SELECT teamnumber, round, score, comments FROM scores ORDER BY teamnumber, round'
      )
      .all()
      .map(rowToScore)
  );
}

export function listScoresForTeam(db: Db, teamNumber: number): ScoreRecord[] {
  return runQuery(db, `load scores for team ${teamNumber}`, () =>
    db
      .prepare<[number], ScoreRow>(
        'SELECT teamnumber, round, score, comments FROM scores WHERE teamnumber = ? ORDER BY round'
      )
      .all(teamNumber)
      .map(rowToScore)
  );
}

export function getScore(db: Db, teamNumber: number, round: RoundNumber): ScoreRecord | null {
  return runQuery(db, `load score ${scoreSlug(teamNumber, round)}`, () => {
    const row = db
      .prepare<[string], ScoreRow>(
        'SELECT teamnumber, round, score, comments FROM scores WHERE slug = ?'
      )
      .get(scoreSlug(teamNumber, round));
    return row ? rowToScore(row) : null;
  });
}

/**
 * Create or replace a round score and audit the change. Range checks happen in the controller.
 */
export function upsertScore(
  db: Db,
  teamNumber: number,
  round: RoundNumber,
  score: number,
  comments: string = ''
): ScoreRecord {
  return runInTransaction(db, `save score ${scoreSlug(teamNumber, round)}`, () => {
    const previous = getScore(db, teamNumber, round);

    db.prepare(
      `INSERT INTO scores (slug, teamnumber, round, score, comments) VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(slug) DO UPDATE SET score = excluded.score, comments = excluded.comments`
    ).run(scoreSlug(teamNumber, round), teamNumber, round, score, comments);

    writeAuditEntry(db, {
      tag: 'score_update',
      teamNumber,
      round,
      oldScore: previous ? previous.score : null,
      newScore: score,
    });

    return { teamNumber, round, score, comments };
  });
}

/**
 * Remove every score of a team, auditing each removal before it happens.
 * Joins the caller's transaction.
 */
export function deleteScoresForTeam(db: Db, teamNumber: number): number {
  return runInTransaction(db, `delete scores for team ${teamNumber}`, () => {
    const scores = listScoresForTeam(db, teamNumber);
    const remove = db.prepare('DELETE FROM scores WHERE slug = ?');

    for (const score of scores) {
      writeAuditEntry(db, {
        tag: 'score_delete',
        teamNumber,
        round: score.round,
        oldScore: score.score,
      });
      remove.run(scoreSlug(teamNumber, score.round));
    }

    return scores.length;
  });
}
