import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './index.js';
import { loadConfig, loadSyncSettings } from './config.js';
import { EventController } from './services/event-controller.js';
import { openStore } from './services/store.js';
import { SyncDispatcher } from './services/sync/index.js';
import { describeError } from './utils/errors.js';

const config = loadConfig();
const store = openStore({ directory: config.dataDir, filename: config.dbFile });

const dispatcher = new SyncDispatcher({
  timeoutMs: config.syncTimeoutMs,
  maxPending: config.syncMaxPending,
});
dispatcher.start();

const credentials = loadSyncSettings(config.syncSettingsPath);
if (credentials) {
  dispatcher.configure(credentials);
} else {
  console.warn(
    `[sync] No reflector settings at ${config.syncSettingsPath}; updates are buffered until configured`
  );
}

const controller = new EventController(store, dispatcher);
controller.restore();

const app = createApp(controller, { corsOrigins: config.corsOrigins });
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[server] Listening on http://localhost:${info.port}`);
});

function shutdown(signal: string): void {
  console.log(`[server] ${signal} received, shutting down`);
  server.close();
  controller
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      console.error(`[server] Shutdown failed: ${describeError(error)}`);
      process.exit(1);
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
