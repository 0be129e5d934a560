import type { Team } from '@event-scoring/shared';
import { TEAM_EXPORT_CSV_HEADERS } from '@event-scoring/shared';

export function escapeForCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Sort key for export: the pit, or the team number for teams without a pit
 */
function pitOrder(team: Team): number {
  return team.pit !== 0 ? team.pit : team.teamNumber;
}

/**
 * Convert teams to CSV, ordered by pit
 */
export function teamsToCsv(teams: readonly Team[]): string {
  const sorted = [...teams].sort((a, b) => pitOrder(a) - pitOrder(b) || a.teamNumber - b.teamNumber);
  const csvLines: string[] = [TEAM_EXPORT_CSV_HEADERS.join(',')];

  for (const team of sorted) {
    const values = [
      team.pit.toString(),
      escapeForCsv(team.name),
      team.teamNumber.toString(),
      team.scores[0].toString(),
      team.scores[1].toString(),
      team.scores[2].toString(),
    ];
    csvLines.push(values.join(','));
  }

  return csvLines.join('\n') + '\n';
}
