import type { RoundNumber } from './team.js';

/**
 * Audit trail event kinds. The live tables can be rebuilt by replaying these in order.
 */
export type AuditEvent =
  | { tag: 'db_created'; appVersion: string; schemaVersion: number }
  | { tag: 'db_opened'; appVersion: string; schemaVersion: number }
  | { tag: 'db_closed' }
  | { tag: 'team_add'; teamNumber: number; name: string; pit: number }
  | {
      tag: 'team_update';
      teamNumber: number;
      oldName: string;
      newName: string;
      oldPit: number;
      newPit: number;
    }
  | { tag: 'team_delete'; teamNumber: number; name: string; pit: number }
  | {
      tag: 'score_update';
      teamNumber: number;
      round: RoundNumber;
      oldScore: number | null;
      newScore: number;
    }
  | { tag: 'score_delete'; teamNumber: number; round: RoundNumber; oldScore: number }
  | {
      tag: 'scoresheet_update';
      teamNumber: number;
      round: RoundNumber;
      oldScoresheet: string | null;
      newScoresheet: string;
    }
  | { tag: 'scoresheet_delete'; teamNumber: number; round: RoundNumber; oldScoresheet: string };

export type AuditTag = AuditEvent['tag'];

export const AUDIT_TAGS: readonly AuditTag[] = [
  'db_created',
  'db_opened',
  'db_closed',
  'team_add',
  'team_update',
  'team_delete',
  'score_update',
  'score_delete',
  'scoresheet_update',
  'scoresheet_delete',
];

export function isAuditTag(value: unknown): value is AuditTag {
  return typeof value === 'string' && (AUDIT_TAGS as readonly string[]).includes(value);
}

/**
 * A stored audit entry. timestamp is Unix epoch seconds.
 */
export type AuditEntry = AuditEvent & { timestamp: number };

export interface AuditQuery {
  tag?: AuditTag;
  limit?: number;
}
