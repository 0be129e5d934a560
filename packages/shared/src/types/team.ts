/**
 * Number of scored rounds every team plays
 */
export const ROUND_COUNT = 3;

/**
 * Score value for a round that has not been played yet
 */
export const UNPLAYED = -1;

export const MAX_SCORE = 999;

/**
 * Rank given to teams without a single played round ("NP")
 */
export const NOT_PLACED_RANK = 1e10;

export type RoundNumber = 1 | 2 | 3;

export const ROUND_NUMBERS: readonly RoundNumber[] = [1, 2, 3];

/**
 * Scores by round, index 0 is round 1. Unplayed rounds hold UNPLAYED.
 */
export type RoundScores = [number, number, number];

export function isRoundNumber(value: unknown): value is RoundNumber {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Team row as persisted
 */
export interface TeamRecord {
  teamNumber: number;
  name: string;
  pit: number; // 0 when no pit is assigned
}

/**
 * Score row as persisted, keyed by "{teamNumber}-{round}"
 */
export interface ScoreRecord {
  teamNumber: number;
  round: RoundNumber;
  score: number;
  comments: string;
}

export interface ScoresheetRecord {
  teamNumber: number;
  round: RoundNumber;
  scoresheet: string; // opaque serialized payload
}

/**
 * Values recomputed whenever a team's scores change
 */
export interface DerivedScores {
  highScore: number;
  secondHighest: number;
  thirdHighest: number;
  highScoreIndex: number; // -1 when no round has been played
}

/**
 * Team as held in memory by the event controller
 */
export interface Team extends TeamRecord, DerivedScores {
  scores: RoundScores;
  rank: number;
}

export type TeamSortOrder = 'rank' | 'number';

/**
 * One line of the audience standings, rank shown as text ("NP" when not placed)
 */
export interface StandingRow {
  rank: string;
  teamNumber: number;
  name: string;
  highScore: number;
}

export interface AddTeamInput {
  number: number;
  name: string;
  pit?: number;
}

export interface UpdateTeamInput {
  name?: string;
  pit?: number;
}

export interface SetScoreInput {
  score: number;
  comments?: string;
}
