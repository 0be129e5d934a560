import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { listAuditEntries, writeAuditEntry } from './audit.js';
import { MATCH_START_TAG, listLogEntries, queryMatchStartTimes, writeLogEntry } from './event-log.js';
import { getScore, listScores, upsertScore } from './scores.js';
import { getScoresheet, listScoresheets, upsertScoresheet } from './scoresheets.js';
import type { ScoreStore } from './store.js';
import { closeStore, openStore } from './store.js';
import { deleteTeam, getTeamByNumber, listTeams, upsertTeam } from './teams.js';
import { PersistenceError } from '../utils/errors.js';

let store: ScoreStore;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  store = openStore({ directory: '.', filename: ':memory:' });
});

afterEach(() => {
  if (store.db.open) {
    closeStore(store);
  }
  vi.restoreAllMocks();
});

// Audit entries written after the db_created entry
function auditAfterCreate() {
  return listAuditEntries(store.db).slice(1);
}

describe('teams', () => {
  it('audits a new team as team_add and a change as team_update', () => {
    upsertTeam(store.db, 42, 'Falcons', 0);
    upsertTeam(store.db, 42, 'Peregrines', 3);

    expect(getTeamByNumber(store.db, 42)).toEqual({ teamNumber: 42, name: 'Peregrines', pit: 3 });
    expect(auditAfterCreate()).toEqual([
      expect.objectContaining({ tag: 'team_add', teamNumber: 42, name: 'Falcons', pit: 0 }),
      expect.objectContaining({
        tag: 'team_update',
        teamNumber: 42,
        oldName: 'Falcons',
        newName: 'Peregrines',
        oldPit: 0,
        newPit: 3,
      }),
    ]);
  });

  it('lists teams by number', () => {
    upsertTeam(store.db, 30, 'C', 0);
    upsertTeam(store.db, 10, 'A', 0);
    upsertTeam(store.db, 20, 'B', 0);

    expect(listTeams(store.db).map((team) => team.teamNumber)).toEqual([10, 20, 30]);
  });

  it('returns null for an unknown team', () => {
    expect(getTeamByNumber(store.db, 99)).toBeNull();
  });

  it('deletes a team with its scores and scoresheets, auditing each removal', () => {
    upsertTeam(store.db, 7, 'Hawks', 2);
    upsertScore(store.db, 7, 1, 120);
    upsertScore(store.db, 7, 3, 90);
    upsertScoresheet(store.db, 7, 1, '{"tasks":[1]}');

    expect(deleteTeam(store.db, 7)).toBe(true);

    expect(listTeams(store.db)).toEqual([]);
    expect(listScores(store.db)).toEqual([]);
    expect(listScoresheets(store.db)).toEqual([]);
    expect(
      auditAfterCreate()
        .slice(4)
        .map((entry) => entry.tag)
    ).toEqual(['team_delete', 'score_delete', 'score_delete', 'scoresheet_delete']);
    expect(listAuditEntries(store.db, { tag: 'score_delete' })).toEqual([
      expect.objectContaining({ teamNumber: 7, round: 1, oldScore: 120 }),
      expect.objectContaining({ teamNumber: 7, round: 3, oldScore: 90 }),
    ]);
    expect(listAuditEntries(store.db, { tag: 'scoresheet_delete' })).toEqual([
      expect.objectContaining({ teamNumber: 7, round: 1, oldScoresheet: '{"tasks":[1]}' }),
    ]);
  });

  it('rolls back the whole cascade when a removal fails partway', () => {
    upsertTeam(store.db, 7, 'Hawks', 2);
    upsertScore(store.db, 7, 1, 120);
    upsertScore(store.db, 7, 2, 90);
    store.db.exec(`
      CREATE TRIGGER lock_round_two BEFORE DELETE ON scores WHEN old.round = 2
      BEGIN SELECT RAISE(ABORT, 'round 2 is locked'); END
    `);
    const auditCount = listAuditEntries(store.db).length;

    expect(() => deleteTeam(store.db, 7)).toThrow(PersistenceError);

    expect(listTeams(store.db)).toEqual([{ teamNumber: 7, name: 'Hawks', pit: 2 }]);
    expect(listScores(store.db)).toHaveLength(2);
    expect(listAuditEntries(store.db)).toHaveLength(auditCount);
  });

  it('reports false when deleting an unknown team', () => {
    expect(deleteTeam(store.db, 5)).toBe(false);
    expect(auditAfterCreate()).toEqual([]);
  });

  it('rolls the write back when its audit entry cannot be written', () => {
    store.db.exec('DROP TABLE audit');

    expect(() => upsertTeam(store.db, 1, 'Orphan', 0)).toThrow(PersistenceError);
    expect(listTeams(store.db)).toEqual([]);
    store.db.close();
  });
});

describe('scores', () => {
  it('replaces a score and records the previous value', () => {
    upsertTeam(store.db, 7, 'Hawks', 0);
    upsertScore(store.db, 7, 2, 150, 'clean run');
    upsertScore(store.db, 7, 2, 175);

    expect(getScore(store.db, 7, 2)).toEqual({ teamNumber: 7, round: 2, score: 175, comments: '' });
    expect(listAuditEntries(store.db, { tag: 'score_update' })).toEqual([
      expect.objectContaining({ teamNumber: 7, round: 2, oldScore: null, newScore: 150 }),
      expect.objectContaining({ teamNumber: 7, round: 2, oldScore: 150, newScore: 175 }),
    ]);
  });

  it('stores audit data as snake_case JSON with timestamp and tag', () => {
    upsertTeam(store.db, 7, 'Hawks', 0);
    writeAuditEntry(
      store.db,
      { tag: 'score_delete', teamNumber: 7, round: 1, oldScore: 30 },
      1700000000
    );

    const row = store.db
      .prepare<[], { data: string }>("SELECT data FROM audit WHERE tag = 'score_delete'")
      .get();

    expect(JSON.parse(row?.data ?? '{}')).toEqual({
      teamnumber: 7,
      round: 1,
      old_score: 30,
      new_score: null,
      timestamp: 1700000000,
      tag: 'score_delete',
    });
  });
});

describe('scoresheets', () => {
  it('round-trips the payload and audits the previous one', () => {
    upsertScoresheet(store.db, 3, 1, 'first');
    upsertScoresheet(store.db, 3, 1, 'second');

    expect(getScoresheet(store.db, 3, 1)?.scoresheet).toBe('second');
    expect(getScoresheet(store.db, 3, 2)).toBeNull();
    expect(listAuditEntries(store.db, { tag: 'scoresheet_update' })).toEqual([
      expect.objectContaining({ oldScoresheet: null, newScoresheet: 'first' }),
      expect.objectContaining({ oldScoresheet: 'first', newScoresheet: 'second' }),
    ]);
  });
});

describe('audit log', () => {
  it('keeps the most recent entries in order when limited', () => {
    upsertTeam(store.db, 1, 'A', 0);
    upsertTeam(store.db, 2, 'B', 0);
    upsertTeam(store.db, 3, 'C', 0);

    const entries = listAuditEntries(store.db, { limit: 2 });

    expect(entries.map((entry) => (entry.tag === 'team_add' ? entry.teamNumber : 0))).toEqual([2, 3]);
  });
});

describe('event log', () => {
  it('reports the latest start of each match ordered by match number', () => {
    writeLogEntry(store.db, MATCH_START_TAG, '1', 100);
    writeLogEntry(store.db, MATCH_START_TAG, '2', 400);
    writeLogEntry(store.db, MATCH_START_TAG, '1', 200);
    writeLogEntry(store.db, MATCH_START_TAG, '10', 900);
    writeLogEntry(store.db, 'note', 'ignored', 50);

    expect(queryMatchStartTimes(store.db)).toEqual([
      { matchNumber: 1, timestamp: 200 },
      { matchNumber: 2, timestamp: 400 },
      { matchNumber: 10, timestamp: 900 },
    ]);
    expect(listLogEntries(store.db, 'note')).toEqual([
      { timestamp: 50, tag: 'note', message: 'ignored' },
    ]);
  });
});
