export { SyncDispatcher, DEFAULT_SYNC_TIMEOUT_MS } from './dispatcher.js';
export type { FetchLike, SyncDispatcherOptions, SyncSink } from './dispatcher.js';
export { buildEventSnapshot, teamsMessage, toReflectorRequest } from './reflector.js';
