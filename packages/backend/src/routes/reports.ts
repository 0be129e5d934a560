import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import { renderCycleTimeReport } from '../services/cycle-time.js';

const router = new Hono<AppEnv>();

// GET /api/reports/cycle-time?format=text - Time between match starts
router.get('/cycle-time', (c) => {
  const rows = c.get('controller').cycleTimeReport();

  if (c.req.query('format') === 'text') {
    return c.text(renderCycleTimeReport(rows));
  }

  return c.json(rows);
});

// GET /api/reports/standings - Ranked teams for the audience display
router.get('/standings', (c) => {
  return c.json(c.get('controller').standings());
});

// GET /api/reports/log?tag=xxx - Operational log, oldest first
router.get('/log', (c) => {
  const tag = c.req.query('tag') || undefined;
  return c.json(c.get('controller').eventLog(tag));
});

// GET /api/reports/audit?tag=xxx&limit=n - Audit trail, oldest first
router.get('/audit', (c) => {
  const tag = c.req.query('tag') || undefined;
  const limitParam = c.req.query('limit');
  const limit = limitParam ? Number(limitParam) : undefined;

  const entries = c.get('controller').auditLog({ tag, limit });
  return c.json(entries);
});

export default router;
