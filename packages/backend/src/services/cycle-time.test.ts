import { describe, it, expect } from 'vitest';
import { buildCycleTimeReport, formatCycleTime, renderCycleTimeReport } from './cycle-time.js';
import { formatClockTime } from '../utils/time.js';

// 10 May 2024 09:05:00, local time
const FIRST_START = new Date(2024, 4, 10, 9, 5, 0).getTime() / 1000;

describe('formatCycleTime', () => {
  it('formats minutes and zero-padded seconds', () => {
    expect(formatCycleTime(725)).toBe('12m05s');
    expect(formatCycleTime(59)).toBe('0m59s');
    expect(formatCycleTime(3600)).toBe('60m00s');
  });

  it('floors negative cycles from a re-run match', () => {
    expect(formatCycleTime(-30)).toBe('-1m30s');
    expect(formatCycleTime(-90)).toBe('-2m30s');
  });
});

describe('formatClockTime', () => {
  it('uses a 12-hour clock without a leading zero', () => {
    expect(formatClockTime(new Date(2024, 4, 10, 9, 5))).toBe('9:05 AM');
    expect(formatClockTime(new Date(2024, 4, 10, 12, 0))).toBe('12:00 PM');
    expect(formatClockTime(new Date(2024, 4, 10, 0, 30))).toBe('12:30 AM');
    expect(formatClockTime(new Date(2024, 4, 10, 15, 45))).toBe('3:45 PM');
  });
});

describe('buildCycleTimeReport', () => {
  it('measures the time since the previous match started', () => {
    const rows = buildCycleTimeReport([
      { matchNumber: 1, timestamp: FIRST_START },
      { matchNumber: 2, timestamp: FIRST_START + 725 },
      { matchNumber: 3, timestamp: FIRST_START + 725 + 59.9 },
    ]);

    expect(rows).toEqual([
      {
        matchNumber: 1,
        startedAt: FIRST_START,
        startTime: '9:05 AM',
        cycleSeconds: null,
        cycleTime: 'N/A',
      },
      {
        matchNumber: 2,
        startedAt: FIRST_START + 725,
        startTime: '9:17 AM',
        cycleSeconds: 725,
        cycleTime: '12m05s',
      },
      {
        matchNumber: 3,
        startedAt: FIRST_START + 725 + 59.9,
        startTime: '9:18 AM',
        cycleSeconds: 59,
        cycleTime: '0m59s',
      },
    ]);
  });

  it('returns no rows without match starts', () => {
    expect(buildCycleTimeReport([])).toEqual([]);
  });
});

describe('renderCycleTimeReport', () => {
  it('renders a fixed-width table', () => {
    const rows = buildCycleTimeReport([
      { matchNumber: 1, timestamp: FIRST_START },
      { matchNumber: 2, timestamp: FIRST_START + 725 },
    ]);

    expect(renderCycleTimeReport(rows).split('\n')).toEqual([
      'Cycle Time Report',
      '='.repeat(60),
      'Match     Start Time          Cycle Time          ',
      '-'.repeat(60),
      '1         9:05 AM             N/A                 ',
      '2         9:17 AM             12m05s              ',
      '='.repeat(60),
    ]);
  });
});
