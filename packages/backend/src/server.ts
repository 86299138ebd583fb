import 'dotenv/config';
import { serve } from '@hono/node-server';
import app from './index.js';
import type { Env } from './index.js';
import { loadConfig } from './config.js';
import { scheduleSourceFromConfig } from './services/schedule-source.js';

const config = loadConfig();

const env: Env = {
  SCHEDULE: scheduleSourceFromConfig(config),
  CUTOFF_DAYS: config.cutoffDays,
};

serve({ fetch: (request) => app.fetch(request, env), port: config.port }, (info) => {
  console.log(`Server is running on http://localhost:${info.port}`);
  console.log(`Schedule source: ${env.SCHEDULE.description}`);
  console.log(`Swaps: POST http://localhost:${info.port}/api/swaps {"gameId":"..."}`);
});
