import type { MatchStatus } from './match.js';
import type { RoundNumber } from './team.js';

/**
 * Where and how to reach the reflector
 */
export interface ReflectorCredentials {
  syncUrl: string;
  eventCode: string;
  apiKey: string;
}

export interface TeamSyncEntry {
  name: string;
  number: number;
  pit: number;
}

/**
 * Messages relayed to the reflector through the sync queue
 */
export type SyncMessage =
  | { kind: 'teams'; teams: TeamSyncEntry[] }
  | { kind: 'match'; match: number; status: MatchStatus }
  | { kind: 'score'; team: number; round: RoundNumber; score: number };

/**
 * Body of POST /sync
 */
export interface EventSnapshot {
  match: number;
  status: MatchStatus;
  teams: Array<{
    name: string;
    teamnumber: number;
    pit: number;
    round1: number;
    round2: number;
    round3: number;
  }>;
}

export interface DeliveryResult {
  delivered: boolean;
  status?: number;
  error?: string;
}

export interface SyncHealth {
  running: boolean;
  configured: boolean;
  pending: number;
  delivered: number;
  failed: number;
  restarts: number;
  lastError: string | null;
}
