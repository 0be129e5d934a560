import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import type { AddTeamInput, SetScoreInput, UpdateTeamInput } from '@event-scoring/shared';
import { NOT_AN_OBJECT_ERROR, isJsonObject } from '../utils/request.js';

const router = new Hono<AppEnv>();

// GET /api/teams?sort=rank|number - List teams, ranked by default
router.get('/', (c) => {
  const sort = c.req.query('sort') ?? 'rank';

  if (sort !== 'rank' && sort !== 'number') {
    return c.json({ error: 'sort must be "rank" or "number"' }, 400);
  }

  return c.json(c.get('controller').listTeams(sort));
});

// GET /api/teams/:number - Get a specific team
router.get('/:number', (c) => {
  const team = c.get('controller').getTeam(Number(c.req.param('number')));
  return c.json(team);
});

// POST /api/teams - Add a team
router.post('/', async (c) => {
  const input: AddTeamInput | null = await c.req.json();

  if (!isJsonObject(input)) {
    return c.json({ error: NOT_AN_OBJECT_ERROR }, 400);
  }

  if (input.number === undefined || input.name === undefined) {
    return c.json({ error: 'Missing required fields: number, name' }, 400);
  }

  const team = c.get('controller').addTeam(input);
  return c.json(team, 201);
});

// PUT /api/teams/:number - Rename a team or move it to another pit
router.put('/:number', async (c) => {
  const input: UpdateTeamInput | null = await c.req.json();

  if (!isJsonObject(input)) {
    return c.json({ error: NOT_AN_OBJECT_ERROR }, 400);
  }

  const team = c.get('controller').updateTeam(Number(c.req.param('number')), input);
  return c.json(team);
});

// DELETE /api/teams/:number - Delete a team with its scores
router.delete('/:number', (c) => {
  c.get('controller').deleteTeam(Number(c.req.param('number')));
  return c.json({ message: 'Team deleted successfully' });
});

// PUT /api/teams/:number/scores/:round - Record a round score
router.put('/:number/scores/:round', async (c) => {
  const input: SetScoreInput | null = await c.req.json();

  if (!isJsonObject(input)) {
    return c.json({ error: NOT_AN_OBJECT_ERROR }, 400);
  }

  if (input.score === undefined) {
    return c.json({ error: 'Missing required field: score' }, 400);
  }

  const team = c
    .get('controller')
    .setScore(Number(c.req.param('number')), Number(c.req.param('round')), input);
  return c.json(team);
});

// GET /api/teams/:number/scoresheets - Every stored scoresheet of a team
router.get('/:number/scoresheets', (c) => {
  return c.json(c.get('controller').listScoresheets(Number(c.req.param('number'))));
});

// GET /api/teams/:number/scoresheets/:round - Fetch a stored scoresheet
router.get('/:number/scoresheets/:round', (c) => {
  const scoresheet = c
    .get('controller')
    .getScoresheet(Number(c.req.param('number')), Number(c.req.param('round')));
  return c.json({ scoresheet });
});

// PUT /api/teams/:number/scoresheets/:round - Store a scoresheet payload
router.put('/:number/scoresheets/:round', async (c) => {
  const input: { scoresheet?: unknown } | null = await c.req.json();

  if (!isJsonObject(input)) {
    return c.json({ error: NOT_AN_OBJECT_ERROR }, 400);
  }

  const scoresheet = c
    .get('controller')
    .setScoresheet(Number(c.req.param('number')), Number(c.req.param('round')), input.scoresheet);
  return c.json({ scoresheet });
});

export default router;
