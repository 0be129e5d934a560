import { Hono } from 'hono';
import type { AppEnv } from '../index.js';

const router = new Hono<AppEnv>();

// POST /api/import/csv?scores=true - Import teams from a CSV body
router.post('/csv', async (c) => {
  const withScores = c.req.query('scores') === 'true';
  const content = await c.req.text();

  if (content.trim() === '') {
    return c.json({ error: 'CSV body is empty' }, 400);
  }

  const result = c.get('controller').importCsv(content, { withScores });
  return c.json(result);
});

export default router;
