import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import { getTimestamp } from '../utils/time.js';

const router = new Hono<AppEnv>();

/**
 * GET /api/export/csv
 * Export teams and round scores as a CSV download, ordered by pit
 */
router.get('/csv', (c) => {
  const csv = c.get('controller').exportCsv();
  const filename = `teams-${getTimestamp()}.csv`;

  // Return as CSV file download
  return new Response(csv, {
    status: 200,
    headers: {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${filename}"`,
    },
  });
});

export default router;
