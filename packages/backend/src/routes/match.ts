import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import { NOT_AN_OBJECT_ERROR, isJsonObject } from '../utils/request.js';

const router = new Hono<AppEnv>();

// GET /api/match - Current match number and status
router.get('/', (c) => {
  return c.json(c.get('controller').matchState());
});

// PUT /api/match - Jump to a match number
router.put('/', async (c) => {
  const input: { matchNumber?: unknown } | null = await c.req.json();

  if (!isJsonObject(input)) {
    return c.json({ error: NOT_AN_OBJECT_ERROR }, 400);
  }

  return c.json(c.get('controller').setMatchNumber(input.matchNumber));
});

// POST /api/match/start
router.post('/start', (c) => {
  return c.json(c.get('controller').startMatch());
});

// POST /api/match/abort
router.post('/abort', (c) => {
  return c.json(c.get('controller').abortMatch());
});

// POST /api/match/complete - Finish the running match and queue the next
router.post('/complete', (c) => {
  return c.json(c.get('controller').completeMatch());
});

export default router;
