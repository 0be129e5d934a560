import { Hono } from 'hono';
import type { ReflectorCredentials } from '@event-scoring/shared';
import type { AppEnv } from '../index.js';
import { NOT_AN_OBJECT_ERROR, isJsonObject } from '../utils/request.js';

const router = new Hono<AppEnv>();

// POST /api/sync/credentials - Configure the reflector
router.post('/credentials', async (c) => {
  const input: Partial<ReflectorCredentials> | null = await c.req.json();

  if (!isJsonObject(input)) {
    return c.json({ error: NOT_AN_OBJECT_ERROR }, 400);
  }

  if (!input.syncUrl || !input.eventCode || !input.apiKey) {
    return c.json({ error: 'Missing required fields: syncUrl, eventCode, apiKey' }, 400);
  }

  c.get('controller').configureSync({
    syncUrl: input.syncUrl,
    eventCode: input.eventCode,
    apiKey: input.apiKey,
  });
  return c.json({ configured: true });
});

// POST /api/sync/force - Push the full event state now
router.post('/force', async (c) => {
  const result = await c.get('controller').forceSync();
  return c.json(result, result.delivered ? 200 : 502);
});

// GET /api/sync/health
router.get('/health', (c) => {
  return c.json(c.get('controller').syncHealth());
});

export default router;
