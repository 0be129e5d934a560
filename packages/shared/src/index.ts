export * from './types/team.js';
export * from './types/audit.js';
export * from './types/match.js';
export * from './types/sync.js';
export * from './types/csv.js';
