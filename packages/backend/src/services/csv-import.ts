import { parse } from 'csv-parse/sync';
import type { RoundScores, TeamImportRow } from '@event-scoring/shared';
import {
  MAX_SCORE,
  PIT_COLUMN,
  ROUND_NUMBERS,
  TEAM_NAME_COLUMN,
  TEAM_NUMBER_COLUMN,
  UNPLAYED,
  roundScoreColumn,
} from '@event-scoring/shared';
import { describeError } from '../utils/errors.js';

export interface CsvParseResult {
  rows: TeamImportRow[];
  errors: string[];
}

export interface ParseTeamsOptions {
  withScores: boolean;
}

const WHOLE_NUMBER = /^-?\d+$/;

/**
 * Interpret a round score cell. Blank, non-numeric and non-positive values mean the round
 * has not been played.
 */
export function parseRoundScore(value: string): number {
  if (!WHOLE_NUMBER.test(value)) {
    return UNPLAYED;
  }
  const score = Number(value);
  return score > 0 ? score : UNPLAYED;
}

function readCell(record: Record<string, unknown>, column: string): string {
  const value = record[column];
  return typeof value === 'string' ? value.trim() : '';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a team list. Every problem is reported; rows are only usable when errors is empty.
 */
export function parseTeamsCsv(content: string, options: ParseTeamsOptions): CsvParseResult {
  const errors: string[] = [];
  const rows: TeamImportRow[] = [];
  let headers: string[] = [];
  let records: unknown;

  try {
    records = parse(content, {
      bom: true,
      columns: (header: string[]) => {
        headers = header.map((column) => column.trim());
        return headers;
      },
      relax_column_count: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (error) {
    return { rows, errors: [`CSV file could not be read: ${describeError(error)}`] };
  }

  if (!Array.isArray(records) || headers.length === 0) {
    return { rows, errors: ['CSV file is empty'] };
  }

  for (const column of [TEAM_NAME_COLUMN, TEAM_NUMBER_COLUMN]) {
    if (!headers.includes(column)) {
      errors.push(`Missing required column "${column}"`);
    }
  }
  if (errors.length > 0) {
    return { rows, errors };
  }

  const hasPit = headers.includes(PIT_COLUMN);
  const seenNumbers = new Map<number, number>();

  records.forEach((record: unknown, index: number) => {
    const rowNumber = index + 2; // 1-indexed, after the header
    if (!isRecord(record)) {
      errors.push(`Row ${rowNumber}: unreadable row`);
      return;
    }

    const rowErrors: string[] = [];
    const name = readCell(record, TEAM_NAME_COLUMN);
    const numberText = readCell(record, TEAM_NUMBER_COLUMN);
    const number = Number(numberText);

    if (name === '') {
      rowErrors.push('Team Name is required');
    }
    if (!/^\d+$/.test(numberText) || number <= 0) {
      rowErrors.push(`Team Number "${numberText}" is not a positive whole number`);
    } else {
      const firstRow = seenNumbers.get(number);
      if (firstRow !== undefined) {
        rowErrors.push(`Team Number ${number} already appears on row ${firstRow}`);
      } else {
        seenNumbers.set(number, rowNumber);
      }
    }

    let pit = 0;
    if (hasPit) {
      const pitText = readCell(record, PIT_COLUMN);
      if (pitText !== '') {
        if (!/^\d+$/.test(pitText)) {
          rowErrors.push(`Pit "${pitText}" is not a whole number`);
        } else {
          pit = Number(pitText);
        }
      }
    }

    let scores: RoundScores | undefined;
    if (options.withScores) {
      const parsed = ROUND_NUMBERS.map((round) => {
        const column = roundScoreColumn(round);
        return headers.includes(column) ? parseRoundScore(readCell(record, column)) : UNPLAYED;
      });
      parsed.forEach((score, i) => {
        if (score > MAX_SCORE) {
          rowErrors.push(`Round ${i + 1} Score ${score} is above ${MAX_SCORE}`);
        }
      });
      scores = [parsed[0], parsed[1], parsed[2]];
    }

    if (rowErrors.length > 0) {
      errors.push(...rowErrors.map((message) => `Row ${rowNumber}: ${message}`));
      return;
    }

    rows.push(scores ? { rowNumber, name, number, pit, scores } : { rowNumber, name, number, pit });
  });

  return { rows, errors };
}
