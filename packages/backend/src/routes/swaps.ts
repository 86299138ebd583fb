import { Hono } from 'hono';
import type { Env } from '../index.js';
import type { ResolveSwapInput, SwapRequest } from '@game-swap/shared';
import { ScheduleSet } from '../services/schedule-set.js';
import { resolveSwap } from '../services/swap-resolver.js';
import { swapCandidatesToCsv, swapExportFilename } from '../services/swap-export.js';
import { computeCutoffDate } from '../utils/date.js';

const router = new Hono<{ Bindings: Env }>();

function isResolveSwapInput(value: unknown): value is ResolveSwapInput {
  if (typeof value !== 'object' || value === null || !('gameId' in value)) return false;
  const gameId = value.gameId;
  const cutoffDate = 'cutoffDate' in value ? value.cutoffDate : undefined;
  return (
    typeof gameId === 'string' &&
    gameId.trim() !== '' &&
    (cutoffDate === undefined || typeof cutoffDate === 'string')
  );
}

async function findSwaps(env: Env, gameId: string, cutoffDate: string | undefined): Promise<SwapRequest> {
  const schedule = ScheduleSet.fromRows(await env.SCHEDULE.load());
  const cutoff = cutoffDate || computeCutoffDate(new Date(), env.CUTOFF_DAYS);
  return resolveSwap(schedule, gameId, cutoff);
}

// POST /api/swaps - Find swap candidates for a game
router.post('/', async (c) => {
  const input: unknown = await c.req.json().catch(() => null);

  if (!isResolveSwapInput(input)) {
    return c.json({ error: 'gameId is required and cutoffDate must be a string' }, 400);
  }

  const request = await findSwaps(c.env, input.gameId.trim(), input.cutoffDate);
  return c.json(request);
});

// GET /api/swaps/:gameId/export - Swap candidates as a CSV download
router.get('/:gameId/export', async (c) => {
  const gameId = c.req.param('gameId');
  const request = await findSwaps(c.env, gameId, c.req.query('cutoffDate'));

  return new Response(swapCandidatesToCsv(request), {
    status: 200,
    headers: {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="${swapExportFilename(gameId)}"`,
    },
  });
});

export default router;
