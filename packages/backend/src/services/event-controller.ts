import type {
  AddTeamInput,
  AuditEntry,
  AuditQuery,
  CycleTimeRow,
  DeliveryResult,
  LogEntry,
  MatchState,
  ReflectorCredentials,
  RoundNumber,
  RoundScores,
  ScoresheetRecord,
  SetScoreInput,
  StandingRow,
  SyncHealth,
  Team,
  TeamImportResult,
  TeamRecord,
  TeamSortOrder,
  UpdateTeamInput,
} from '@event-scoring/shared';
import {
  MAX_SCORE,
  NOT_PLACED_RANK,
  ROUND_NUMBERS,
  UNPLAYED,
  isAuditTag,
  isRoundNumber,
} from '@event-scoring/shared';
import { listAuditEntries } from './audit.js';
import { teamsToCsv } from './csv-export.js';
import { parseTeamsCsv } from './csv-import.js';
import { buildCycleTimeReport } from './cycle-time.js';
import { MATCH_START_TAG, listLogEntries, queryMatchStartTimes, writeLogEntry } from './event-log.js';
import { computeDerivedScores, formatRank, rankTeams, sortTeams } from './ranking.js';
import { listScores, upsertScore } from './scores.js';
import { getScoresheet, listScoresheets, upsertScoresheet } from './scoresheets.js';
import type { ScoreStore } from './store.js';
import { closeStore, getMeta, setMeta } from './store.js';
import { buildEventSnapshot, teamsMessage } from './sync/reflector.js';
import type { SyncSink } from './sync/dispatcher.js';
import { deleteTeam, listTeams, upsertTeam } from './teams.js';
import { runInTransaction } from '../utils/db.js';
import { NotFoundError, ValidationError, describeError } from '../utils/errors.js';

export type TeamsListener = (teams: readonly Team[]) => void;

export interface ImportCsvOptions {
  withScores: boolean;
}

const MATCH_NUMBER_META_KEY = 'match_number';

function emptyScores(): RoundScores {
  return [UNPLAYED, UNPLAYED, UNPLAYED];
}

function toTeam(record: TeamRecord, scores: RoundScores): Team {
  return {
    ...record,
    scores,
    ...computeDerivedScores(scores),
    rank: NOT_PLACED_RANK,
  };
}

function requireTeamNumber(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`Team number must be a positive whole number, got ${String(value)}`);
  }
  return value;
}

function requireName(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError('Team name is required');
  }
  return value.trim();
}

function requirePit(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`Pit must be a non-negative whole number, got ${String(value)}`);
  }
  return value;
}

function requireRound(value: unknown): RoundNumber {
  if (!isRoundNumber(value)) {
    throw new ValidationError(`Round must be 1, 2 or 3, got ${String(value)}`);
  }
  return value;
}

function requireScore(value: unknown): number {
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < UNPLAYED ||
    value > MAX_SCORE
  ) {
    throw new ValidationError(
      `Score must be a whole number from ${UNPLAYED} to ${MAX_SCORE}, got ${String(value)}`
    );
  }
  return value;
}

/**
 * Owns the in-memory team collection and drives every mutation through the store, the ranking
 * and the sync queue, in that order.
 */
export class EventController {
  private readonly teams = new Map<number, Team>();
  private ranked: Team[] = [];
  private match: MatchState = { matchNumber: 1, status: 'queueing' };
  private readonly listeners = new Set<TeamsListener>();
  private closing: Promise<void> | null = null;

  constructor(
    private readonly store: ScoreStore,
    private readonly sync: SyncSink
  ) {}

  /**
   * Load teams, scores and the current match number from the store
   */
  restore(): void {
    const count = this.loadTeams();

    const storedMatch = Number(getMeta(this.store.db, MATCH_NUMBER_META_KEY));
    if (Number.isInteger(storedMatch) && storedMatch > 0) {
      this.match = { matchNumber: storedMatch, status: 'queueing' };
    }

    console.log(`[store] Restored ${count} team(s), match ${this.match.matchNumber}`);
  }

  private loadTeams(): number {
    const { db } = this.store;
    const records = listTeams(db);
    const scoresByTeam = new Map<number, RoundScores>(
      records.map((record) => [record.teamNumber, emptyScores()])
    );

    for (const score of listScores(db)) {
      const scores = scoresByTeam.get(score.teamNumber);
      if (!scores) {
        console.warn(`[store] Ignoring score ${score.teamNumber}-${score.round} for unknown team`);
        continue;
      }
      scores[score.round - 1] = score.score;
    }

    this.teams.clear();
    for (const record of records) {
      const scores = scoresByTeam.get(record.teamNumber) ?? emptyScores();
      this.teams.set(record.teamNumber, toTeam(record, scores));
    }

    this.rerank();
    return records.length;
  }

  listTeams(order: TeamSortOrder = 'rank'): Team[] {
    return sortTeams(this.ranked, order);
  }

  standings(): StandingRow[] {
    return sortTeams(this.ranked, 'rank').map((team) => ({
      rank: formatRank(team.rank),
      teamNumber: team.teamNumber,
      name: team.name,
      highScore: team.highScore,
    }));
  }

  getTeam(teamNumber: number): Team {
    const team = this.teams.get(requireTeamNumber(teamNumber));
    if (!team) {
      throw new NotFoundError(`Team ${teamNumber} not found`);
    }
    return team;
  }

  /**
   * Add a team. Without a pit, the team takes the pit after the highest one assigned.
   */
  addTeam(input: AddTeamInput): Team {
    const teamNumber = requireTeamNumber(input.number);
    const name = requireName(input.name);
    const existing = this.teams.get(teamNumber);

    if (existing) {
      if (existing.name === name && (input.pit === undefined || input.pit === existing.pit)) {
        return existing;
      }
      throw new ValidationError(`Team ${teamNumber} already exists as "${existing.name}"`);
    }

    const pit = input.pit === undefined ? this.nextPit() : requirePit(input.pit);
    const record = upsertTeam(this.store.db, teamNumber, name, pit);
    this.teams.set(teamNumber, toTeam(record, emptyScores()));
    this.teamsChanged();
    return this.getTeam(teamNumber);
  }

  updateTeam(teamNumber: number, input: UpdateTeamInput): Team {
    const team = this.getTeam(teamNumber);
    if (input.name === undefined && input.pit === undefined) {
      throw new ValidationError('Nothing to update: provide a name or a pit');
    }

    const name = input.name === undefined ? team.name : requireName(input.name);
    const pit = input.pit === undefined ? team.pit : requirePit(input.pit);
    if (name === team.name && pit === team.pit) {
      return team;
    }

    const record = upsertTeam(this.store.db, team.teamNumber, name, pit);
    this.teams.set(team.teamNumber, toTeam(record, team.scores));
    this.teamsChanged();
    return this.getTeam(team.teamNumber);
  }

  /**
   * Record a round score. -1 marks the round as not played.
   */
  setScore(teamNumber: number, round: number, input: SetScoreInput): Team {
    const team = this.getTeam(teamNumber);
    const roundNumber = requireRound(round);
    const score = requireScore(input.score);
    if (input.comments !== undefined && typeof input.comments !== 'string') {
      throw new ValidationError('Comments must be text');
    }

    upsertScore(this.store.db, team.teamNumber, roundNumber, score, input.comments ?? '');

    const scores: RoundScores = [team.scores[0], team.scores[1], team.scores[2]];
    scores[roundNumber - 1] = score;
    this.teams.set(team.teamNumber, toTeam(team, scores));
    this.rerank();
    this.sync.enqueue({ kind: 'score', team: team.teamNumber, round: roundNumber, score });
    this.notify();
    return this.getTeam(team.teamNumber);
  }

  setScoresheet(teamNumber: number, round: number, scoresheet: unknown): string {
    const team = this.getTeam(teamNumber);
    const roundNumber = requireRound(round);
    if (typeof scoresheet !== 'string' || scoresheet === '') {
      throw new ValidationError('Scoresheet must be a non-empty serialized payload');
    }
    return upsertScoresheet(this.store.db, team.teamNumber, roundNumber, scoresheet).scoresheet;
  }

  listScoresheets(teamNumber: number): ScoresheetRecord[] {
    const team = this.getTeam(teamNumber);
    return listScoresheets(this.store.db).filter((record) => record.teamNumber === team.teamNumber);
  }

  getScoresheet(teamNumber: number, round: number): string {
    const team = this.getTeam(teamNumber);
    const roundNumber = requireRound(round);
    const record = getScoresheet(this.store.db, team.teamNumber, roundNumber);
    if (!record) {
      throw new NotFoundError(`No scoresheet for team ${team.teamNumber} round ${roundNumber}`);
    }
    return record.scoresheet;
  }

  /**
   * Permanently delete a team with its scores and scoresheets
   */
  deleteTeam(teamNumber: number): void {
    const team = this.getTeam(teamNumber);
    deleteTeam(this.store.db, team.teamNumber);
    this.teams.delete(team.teamNumber);
    this.teamsChanged();
  }

  /**
   * Import teams from CSV. The file is rejected as a whole when any row is invalid or conflicts
   * with a team already registered.
   */
  importCsv(content: string, options: ImportCsvOptions): TeamImportResult {
    const { rows, errors } = parseTeamsCsv(content, options);

    for (const row of rows) {
      const existing = this.teams.get(row.number);
      if (existing && existing.name !== row.name) {
        errors.push(
          `Row ${row.rowNumber}: Team Number ${row.number} already belongs to "${existing.name}"`
        );
      }
    }
    if (errors.length > 0) {
      throw new ValidationError('CSV import rejected', errors);
    }

    const result: TeamImportResult = { added: 0, updated: 0, scoresWritten: 0 };
    const written: Array<{ team: number; round: RoundNumber; score: number }> = [];
    const { db } = this.store;

    runInTransaction(db, 'import teams', () => {
      for (const row of rows) {
        const existing = this.teams.get(row.number);
        let changed = false;

        if (!existing) {
          upsertTeam(db, row.number, row.name, row.pit);
          result.added++;
        } else if (row.pit !== 0 && row.pit !== existing.pit) {
          upsertTeam(db, row.number, existing.name, row.pit);
          changed = true;
        }

        if (row.scores) {
          const current = existing ? existing.scores : emptyScores();
          for (const round of ROUND_NUMBERS) {
            const score = row.scores[round - 1];
            if (score !== current[round - 1]) {
              upsertScore(db, row.number, round, score);
              written.push({ team: row.number, round, score });
              changed = true;
            }
          }
        }

        if (existing && changed) {
          result.updated++;
        }
      }
    });

    result.scoresWritten = written.length;
    this.loadTeams();
    this.sync.enqueue(teamsMessage(this.listTeams('number')));
    for (const score of written) {
      this.sync.enqueue({ kind: 'score', ...score });
    }
    this.notify();

    console.log(
      `[store] Imported teams: ${result.added} added, ${result.updated} updated, ${result.scoresWritten} score(s) written`
    );
    return result;
  }

  exportCsv(): string {
    return teamsToCsv(this.ranked);
  }

  matchState(): MatchState {
    return { ...this.match };
  }

  startMatch(): MatchState {
    if (this.match.status === 'running') {
      throw new ValidationError(`Match ${this.match.matchNumber} is already running`);
    }
    writeLogEntry(this.store.db, MATCH_START_TAG, String(this.match.matchNumber));
    return this.setMatch(this.match.matchNumber, 'running');
  }

  abortMatch(): MatchState {
    if (this.match.status !== 'running') {
      throw new ValidationError(`Match ${this.match.matchNumber} is not running`);
    }
    return this.setMatch(this.match.matchNumber, 'aborted');
  }

  /**
   * Finish the running match and queue the next one
   */
  completeMatch(): MatchState {
    if (this.match.status !== 'running') {
      throw new ValidationError(`Match ${this.match.matchNumber} is not running`);
    }
    return this.setMatch(this.match.matchNumber + 1, 'queueing');
  }

  setMatchNumber(matchNumber: unknown): MatchState {
    if (typeof matchNumber !== 'number' || !Number.isInteger(matchNumber) || matchNumber <= 0) {
      throw new ValidationError(`Match number must be a positive whole number, got ${String(matchNumber)}`);
    }
    if (this.match.status === 'running') {
      throw new ValidationError(`Match ${this.match.matchNumber} is running`);
    }
    return this.setMatch(matchNumber, 'queueing');
  }

  configureSync(credentials: ReflectorCredentials): void {
    this.sync.configure(credentials);
  }

  /**
   * Push the full event state to the reflector now, outside the queue
   */
  forceSync(): Promise<DeliveryResult> {
    const snapshot = buildEventSnapshot(
      this.match.matchNumber,
      this.match.status,
      this.listTeams('number')
    );
    return this.sync.forceSync(snapshot);
  }

  syncHealth(): SyncHealth {
    return this.sync.health();
  }

  cycleTimeReport(): CycleTimeRow[] {
    return buildCycleTimeReport(queryMatchStartTimes(this.store.db));
  }

  eventLog(tag?: string): LogEntry[] {
    return listLogEntries(this.store.db, tag);
  }

  /**
   * Audit entries oldest first. The tag arrives unchecked from query strings.
   */
  auditLog(query: { tag?: string; limit?: number } = {}): AuditEntry[] {
    const filter: AuditQuery = {};
    if (query.tag !== undefined) {
      if (!isAuditTag(query.tag)) {
        throw new ValidationError(`Unknown audit tag "${query.tag}"`);
      }
      filter.tag = query.tag;
    }
    if (query.limit !== undefined) {
      if (!Number.isInteger(query.limit) || query.limit <= 0) {
        throw new ValidationError(`Limit must be a positive whole number, got ${query.limit}`);
      }
      filter.limit = query.limit;
    }
    return listAuditEntries(this.store.db, filter);
  }

  onChange(listener: TeamsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Stop the sync worker after it drains, then close the store. Later calls wait on the first.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.sync.stop().then(() => closeStore(this.store));
    }
    return this.closing;
  }

  private nextPit(): number {
    let highest = 0;
    for (const team of this.teams.values()) {
      highest = Math.max(highest, team.pit);
    }
    return highest + 1;
  }

  private setMatch(matchNumber: number, status: MatchState['status']): MatchState {
    if (matchNumber !== this.match.matchNumber) {
      setMeta(this.store.db, MATCH_NUMBER_META_KEY, String(matchNumber));
    }
    this.match = { matchNumber, status };
    this.sync.enqueue({ kind: 'match', match: matchNumber, status });
    return this.matchState();
  }

  private rerank(): void {
    this.ranked = rankTeams([...this.teams.values()]);
    for (const team of this.ranked) {
      this.teams.set(team.teamNumber, team);
    }
  }

  private teamsChanged(): void {
    this.rerank();
    this.sync.enqueue(teamsMessage(this.listTeams('number')));
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.ranked);
      } catch (error) {
        console.error(`[server] Change listener failed: ${describeError(error)}`);
      }
    }
  }
}
