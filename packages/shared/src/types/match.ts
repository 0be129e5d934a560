/**
 * Match status vocabulary shared with the reflector
 */
export type MatchStatus = 'queueing' | 'running' | 'aborted';

export interface MatchState {
  matchNumber: number;
  status: MatchStatus;
}

/**
 * Latest recorded start of a match, from the operational log
 */
export interface MatchStartTime {
  matchNumber: number;
  timestamp: number; // epoch seconds
}

export interface CycleTimeRow {
  matchNumber: number;
  startedAt: number; // epoch seconds
  startTime: string; // h:mm AM/PM, local time
  cycleSeconds: number | null; // null for the first match
  cycleTime: string; // e.g. 12m05s, or N/A
}

/**
 * Operational log entry, separate from the audit trail
 */
export interface LogEntry {
  timestamp: number;
  tag: string;
  message: string;
}
