/**
 * CSV column headers for team export
 */
export const TEAM_EXPORT_CSV_HEADERS = [
  'Pit #',
  'Team Name',
  'Team Number',
  'Round 1 Score',
  'Round 2 Score',
  'Round 3 Score',
] as const;

export const PIT_COLUMN = 'Pit #';
export const TEAM_NAME_COLUMN = 'Team Name';
export const TEAM_NUMBER_COLUMN = 'Team Number';

export function roundScoreColumn(round: number): string {
  return `Round ${round} Score`;
}

/**
 * A validated row from a team import file
 */
export interface TeamImportRow {
  rowNumber: number;
  name: string;
  number: number;
  pit: number; // 0 when the file has no pit
  scores?: [number, number, number]; // present only when importing scores
}

export interface TeamImportResult {
  added: number;
  updated: number;
  scoresWritten: number;
}
