import type { CycleTimeRow, MatchStartTime } from '@event-scoring/shared';
import { formatClockTime } from '../utils/time.js';

const RULE_WIDTH = 60;

export function formatCycleTime(seconds: number): string {
  // Floored, so a negative cycle reads -1m30s
  const minutes = Math.floor(seconds / 60);
  const remainder = ((seconds % 60) + 60) % 60;
  return `${minutes}m${String(remainder).padStart(2, '0')}s`;
}

/**
 * Elapsed time between the starts of consecutive matches
 */
export function buildCycleTimeReport(starts: readonly MatchStartTime[]): CycleTimeRow[] {
  let previous: number | null = null;

  return starts.map((start) => {
    const cycleSeconds = previous === null ? null : Math.trunc(start.timestamp - previous);
    previous = start.timestamp;

    return {
      matchNumber: start.matchNumber,
      startedAt: start.timestamp,
      startTime: formatClockTime(new Date(start.timestamp * 1000)),
      cycleSeconds,
      cycleTime: cycleSeconds === null ? 'N/A' : formatCycleTime(cycleSeconds),
    };
  });
}

/**
 * Plaintext table for pasting into an event report
 */
export function renderCycleTimeReport(rows: readonly CycleTimeRow[]): string {
  const lines = [
    'Cycle Time Report',
    '='.repeat(RULE_WIDTH),
    `${'Match'.padEnd(10)}${'Start Time'.padEnd(20)}${'Cycle Time'.padEnd(20)}`,
    '-'.repeat(RULE_WIDTH),
  ];

  for (const row of rows) {
    lines.push(
      `${String(row.matchNumber).padEnd(10)}${row.startTime.padEnd(20)}${row.cycleTime.padEnd(20)}`
    );
  }

  lines.push('='.repeat(RULE_WIDTH));
  return lines.join('\n');
}
