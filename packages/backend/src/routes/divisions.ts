import { Hono } from 'hono';
import type { Env } from '../index.js';
import { defaultDivisionRegistry, toDivisionSummary } from '../services/division-registry.js';

const router = new Hono<{ Bindings: Env }>();

// GET /api/divisions - List divisions and who they can swap with
router.get('/', (c) => {
  return c.json(defaultDivisionRegistry.list().map(toDivisionSummary));
});

// GET /api/divisions/resolve?label=U13%20Girls%20B1 - Find the division of a schedule label
router.get('/resolve', (c) => {
  const label = c.req.query('label');

  if (!label) {
    return c.json({ error: 'label is required' }, 400);
  }

  return c.json(toDivisionSummary(defaultDivisionRegistry.resolve(label)));
});

export default router;
