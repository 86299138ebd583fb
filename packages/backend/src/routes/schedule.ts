import { Hono } from 'hono';
import type { Env } from '../index.js';
import { ScheduleSet, isWellFormed, listTeams, listDivisionLabels } from '../services/schedule-set.js';
import { defaultDivisionRegistry } from '../services/division-registry.js';

const router = new Hono<{ Bindings: Env }>();

// GET /api/schedule/teams - Distinct team names in the schedule
router.get('/teams', async (c) => {
  const schedule = ScheduleSet.fromRows(await c.env.SCHEDULE.load());
  return c.json(listTeams(schedule));
});

// GET /api/schedule/divisions - Distinct division labels in the schedule
router.get('/divisions', async (c) => {
  const schedule = ScheduleSet.fromRows(await c.env.SCHEDULE.load());
  return c.json(listDivisionLabels(schedule));
});

// GET /api/schedule/games?division=U13%20A - Games, optionally for one division
router.get('/games', async (c) => {
  const divisionName = c.req.query('division');
  const division = divisionName ? defaultDivisionRegistry.get(divisionName) : undefined;

  if (divisionName && !division) {
    return c.json({ error: `Unknown division: ${divisionName}` }, 400);
  }

  const schedule = ScheduleSet.fromRows(await c.env.SCHEDULE.load());
  const games = schedule.filter(
    (game) => isWellFormed(game) && (!division || division.matches(game.division))
  );

  return c.json(games.records);
});

export default router;
