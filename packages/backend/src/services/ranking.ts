import type { DerivedScores, RoundScores, Team, TeamSortOrder } from '@event-scoring/shared';
import { NOT_PLACED_RANK, UNPLAYED } from '@event-scoring/shared';

/**
 * High score, runner-up scores and the round of the high score.
 * Ties on the high score resolve to the earliest round.
 */
export function computeDerivedScores(scores: RoundScores): DerivedScores {
  const [highScore, secondHighest, thirdHighest] = [...scores].sort((a, b) => b - a);
  return {
    highScore,
    secondHighest,
    thirdHighest,
    highScoreIndex: highScore === UNPLAYED ? -1 : scores.indexOf(highScore),
  };
}

function copyScores(scores: RoundScores): RoundScores {
  return [scores[0], scores[1], scores[2]];
}

export function hasPlayed(scores: RoundScores): boolean {
  return scores.some((score) => score !== UNPLAYED);
}

/**
 * Total order: best scores first, lower team number wins a full tie
 */
function compareForRanking(a: Team, b: Team): number {
  return (
    b.highScore - a.highScore ||
    b.secondHighest - a.secondHighest ||
    b.thirdHighest - a.thirdHighest ||
    a.teamNumber - b.teamNumber
  );
}

/**
 * Rank teams. Returns new team objects in rank order; teams that have not played a round
 * come last with NOT_PLACED_RANK.
 */
export function rankTeams(teams: readonly Team[]): Team[] {
  const sorted = teams
    .map((team) => ({
      ...team,
      scores: copyScores(team.scores),
      ...computeDerivedScores(team.scores),
    }))
    .sort(compareForRanking);

  return sorted.map((team, index) => ({
    ...team,
    rank: hasPlayed(team.scores) ? index + 1 : NOT_PLACED_RANK,
  }));
}

export function formatRank(rank: number): string {
  return rank >= NOT_PLACED_RANK ? 'NP' : String(rank);
}

export function sortTeams(teams: readonly Team[], order: TeamSortOrder): Team[] {
  const copy = [...teams];
  if (order === 'number') {
    return copy.sort((a, b) => a.teamNumber - b.teamNumber);
  }
  return copy.sort((a, b) => a.rank - b.rank || a.teamNumber - b.teamNumber);
}
