/**
 * Runtime configuration, read from environment variables (and .env via dotenv)
 */
export interface AppConfig {
  port: number;
  scheduleUrl?: string; // league schedule API; when unset the local file is used
  scheduleFile: string; // local copy of the schedule
  cutoffDays: number; // games within this many days of today are not swappable
  outputDir: string;
}

type EnvVars = Record<string, string | undefined>;

function parseNonNegativeInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: EnvVars = process.env): AppConfig {
  const scheduleUrl = env.SCHEDULE_URL?.trim();
  return {
    port: parseNonNegativeInt('PORT', env.PORT, 8787),
    ...(scheduleUrl ? { scheduleUrl } : {}),
    scheduleFile: env.SCHEDULE_FILE || './schedule.csv',
    cutoffDays: parseNonNegativeInt('CUTOFF_DAYS', env.CUTOFF_DAYS, 10),
    outputDir: env.OUTPUT_DIR || '.',
  };
}
