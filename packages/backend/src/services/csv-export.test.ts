import { describe, it, expect } from 'vitest';
import { NOT_PLACED_RANK } from '@event-scoring/shared';
import type { RoundScores, Team } from '@event-scoring/shared';
import { escapeForCsv, teamsToCsv } from './csv-export.js';
import { computeDerivedScores } from './ranking.js';

// Helper to create a team
function createTeam(teamNumber: number, name: string, pit: number, scores: RoundScores): Team {
  return { teamNumber, name, pit, scores, ...computeDerivedScores(scores), rank: NOT_PLACED_RANK };
}

describe('escapeForCsv', () => {
  it('quotes values with separators or quotes', () => {
    expect(escapeForCsv('Falcons')).toBe('Falcons');
    expect(escapeForCsv('Hawks, Jr')).toBe('"Hawks, Jr"');
    expect(escapeForCsv('The "Owls"')).toBe('"The ""Owls"""');
  });
});

describe('teamsToCsv', () => {
  it('writes teams ordered by pit, using the team number when no pit is assigned', () => {
    const csv = teamsToCsv([
      createTeam(42, 'Falcons', 3, [150, -1, -1]),
      createTeam(7, 'Hawks, Jr', 0, [-1, -1, -1]),
      createTeam(5, 'Owls', 1, [10, 20, 30]),
    ]);

    expect(csv).toBe(
      [
        'Pit #,Team Name,Team Number,Round 1 Score,Round 2 Score,Round 3 Score',
        '1,Owls,5,10,20,30',
        '3,Falcons,42,150,-1,-1',
        '0,"Hawks, Jr",7,-1,-1,-1',
        '',
      ].join('\n')
    );
  });

  it('writes only the header for an empty event', () => {
    expect(teamsToCsv([])).toBe(
      'Pit #,Team Name,Team Number,Round 1 Score,Round 2 Score,Round 3 Score\n'
    );
  });
});
