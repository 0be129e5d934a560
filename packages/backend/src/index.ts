import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { EventController } from './services/event-controller.js';
import { NotFoundError, PersistenceError, ValidationError } from './utils/errors.js';
import teamsRouter from './routes/teams.js';
import matchRouter from './routes/match.js';
import importRouter from './routes/import.js';
import exportRouter from './routes/export.js';
import reportsRouter from './routes/reports.js';
import syncRouter from './routes/sync.js';

export type AppEnv = {
  Variables: {
    controller: EventController;
  };
};

export interface AppOptions {
  corsOrigins?: string[];
}

export function createApp(controller: EventController, options: AppOptions = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use('/*', async (c, next) => {
    c.set('controller', controller);
    await next();
  });

  // CORS middleware
  app.use('/*', cors({
    origin: options.corsOrigins ?? ['http://localhost:3000'],
    credentials: true,
  }));

  // Health check
  app.get('/health', (c) => {
    return c.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // API routes
  app.route('/api/teams', teamsRouter);
  app.route('/api/match', matchRouter);
  app.route('/api/import', importRouter);
  app.route('/api/export', exportRouter);
  app.route('/api/reports', reportsRouter);
  app.route('/api/sync', syncRouter);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, details: err.details }, 400);
    }
    if (err instanceof NotFoundError) {
      return c.json({ error: err.message }, 404);
    }
    if (err instanceof SyntaxError) {
      return c.json({ error: 'Request body is not valid JSON' }, 400);
    }
    if (err instanceof PersistenceError) {
      console.error('[server] Store error:', err);
      return c.json({ error: err.message }, 500);
    }
    console.error('[server] Error:', err);
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  return app;
}
