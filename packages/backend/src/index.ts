import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { ApiErrorResponse } from '@game-swap/shared';
import type { ScheduleSource } from './services/schedule-source.js';
import { GameNotFoundError, OutputWriteError, PastCutoffError, ScheduleSourceError, isSwapError } from './errors.js';
import divisionsRouter from './routes/divisions.js';
import scheduleRouter from './routes/schedule.js';
import swapsRouter from './routes/swaps.js';

export type Env = {
  SCHEDULE: ScheduleSource;
  CUTOFF_DAYS: number;
};

const app = new Hono<{ Bindings: Env }>();

// CORS middleware
app.use('/*', cors({
  origin: ['http://localhost:5173', 'http://localhost:3000'],
  credentials: true,
}));

// Health check
app.get('/health', (c) => {
  return c.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// API routes
app.route('/api/divisions', divisionsRouter);
app.route('/api/schedule', scheduleRouter);
app.route('/api/swaps', swapsRouter);

// 404 handler
app.notFound((c) => {
  return c.json({ error: 'Not found' }, 404);
});

// Error handler: resolution errors are the caller's problem, source errors are upstream
app.onError((err, c) => {
  if (err instanceof GameNotFoundError) {
    const body: ApiErrorResponse = { error: err.message, code: err.code };
    return c.json(body, 404);
  }
  if (err instanceof PastCutoffError) {
    const body: ApiErrorResponse = { error: err.message, code: err.code, request: err.request };
    return c.json(body, 422);
  }
  if (isSwapError(err)) {
    const body: ApiErrorResponse = { error: err.message, code: err.code };
    return c.json(body, 422);
  }
  if (err instanceof ScheduleSourceError) {
    console.error('Schedule source error:', err);
    const body: ApiErrorResponse = { error: err.message, code: 'SCHEDULE_SOURCE' };
    return c.json(body, 502);
  }
  if (err instanceof OutputWriteError) {
    console.error('Output error:', err);
    const body: ApiErrorResponse = { error: err.message, code: 'OUTPUT_WRITE' };
    return c.json(body, 500);
  }
  console.error('Error:', err);
  return c.json({ error: 'Internal server error', message: err.message }, 500);
});

export default app;
