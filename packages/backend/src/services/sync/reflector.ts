import type {
  EventSnapshot,
  MatchStatus,
  ReflectorCredentials,
  SyncMessage,
  Team,
  TeamRecord,
} from '@event-scoring/shared';

export type ReflectorPath = '/teams' | '/match' | '/scores' | '/sync';

export interface ReflectorRequest {
  path: ReflectorPath;
  body: unknown;
}

/**
 * Base URL for an event: {syncUrl}/{eventCode}
 */
export function reflectorBaseUrl(credentials: ReflectorCredentials): string {
  return `${credentials.syncUrl.replace(/\/+$/, '')}/${encodeURIComponent(credentials.eventCode)}`;
}

/**
 * Map a queued message to its endpoint and JSON body
 */
export function toReflectorRequest(message: SyncMessage): ReflectorRequest {
  switch (message.kind) {
    case 'teams':
      return { path: '/teams', body: message.teams };
    case 'match':
      return { path: '/match', body: { match: message.match, status: message.status } };
    case 'score':
      return {
        path: '/scores',
        body: { team: message.team, match: message.round, score: message.score },
      };
  }
}

export function teamsMessage(teams: readonly TeamRecord[]): SyncMessage {
  return {
    kind: 'teams',
    teams: teams.map((team) => ({ name: team.name, number: team.teamNumber, pit: team.pit })),
  };
}

export function buildEventSnapshot(
  match: number,
  status: MatchStatus,
  teams: readonly Team[]
): EventSnapshot {
  return {
    match,
    status,
    teams: teams.map((team) => ({
      name: team.name,
      teamnumber: team.teamNumber,
      pit: team.pit,
      round1: team.scores[0],
      round2: team.scores[1],
      round3: team.scores[2],
    })),
  };
}

export function describeMessage(message: SyncMessage): string {
  switch (message.kind) {
    case 'teams':
      return `teams (${message.teams.length})`;
    case 'match':
      return `match ${message.match} ${message.status}`;
    case 'score':
      return `score ${message.team}-${message.round}`;
  }
}
