import type { SwapRequest } from '@game-swap/shared';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { ScheduleSet } from './services/schedule-set.js';
import { resolveSwap } from './services/swap-resolver.js';
import { writeSwapCsv } from './services/swap-export.js';
import {
  CsvFileScheduleSource,
  RemoteScheduleSource,
  saveScheduleCsv,
} from './services/schedule-source.js';
import { computeCutoffDate } from './utils/date.js';
import { PastCutoffError, getErrorMessage } from './errors.js';

export interface CliOptions {
  gameId: string;
  cutoffDate?: string;
  csvPath?: string;
  outputDir?: string;
}

const USAGE = 'Usage: game-swap <gameId> [--cutoff YYYY-MM-DD] [--csv schedule.csv] [--out dir]';

/**
 * Parse `<gameId> [--cutoff d] [--csv file] [--out dir]`
 */
export function parseCliArgs(args: string[]): CliOptions {
  const options: Partial<CliOptions> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    const takeValue = (): string => {
      if (value === undefined || value.startsWith('--')) {
        throw new Error(`${arg} needs a value\n${USAGE}`);
      }
      i++;
      return value;
    };

    if (arg === '--cutoff') {
      options.cutoffDate = takeValue();
    } else if (arg === '--csv') {
      options.csvPath = takeValue();
    } else if (arg === '--out') {
      options.outputDir = takeValue();
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option ${arg}\n${USAGE}`);
    } else if (options.gameId === undefined) {
      options.gameId = arg;
    } else {
      throw new Error(`Unexpected argument ${arg}\n${USAGE}`);
    }
  }

  if (!options.gameId) {
    throw new Error(`Game id is required (i.e. HLU1501)\n${USAGE}`);
  }
  return { ...options, gameId: options.gameId };
}

/**
 * Human-readable summary of a swap search
 */
export function formatSwapReport(request: SwapRequest, outputPath?: string): string[] {
  const lines = [
    `Game date: ${request.date}`,
    `Home team: ${request.homeTeam}`,
    `Away team: ${request.awayTeam}`,
    `Your division: ${request.division.name}`,
    `Searching for swaps with the following divisions: ${request.division.description}`,
    `Dates already played by these teams: ${request.excludeDates.join(', ') || 'none'}`,
    `Teams already playing on ${request.date}: ${request.excludeTeams.join(', ') || 'none'}`,
  ];
  for (const game of request.candidates) {
    lines.push(game.fields.join(','));
  }
  lines.push(
    outputPath
      ? `Recorded ${request.candidates.length} potential matches to ${outputPath}`
      : `Found ${request.candidates.length} potential matches`
  );
  return lines;
}

async function loadSchedule(options: CliOptions, config: AppConfig): Promise<ScheduleSet> {
  if (options.csvPath) {
    return ScheduleSet.fromRows(await new CsvFileScheduleSource(options.csvPath).load());
  }
  if (!config.scheduleUrl) {
    return ScheduleSet.fromRows(await new CsvFileScheduleSource(config.scheduleFile).load());
  }
  const rows = await new RemoteScheduleSource(config.scheduleUrl).load();
  await saveScheduleCsv(rows, config.scheduleFile);
  return ScheduleSet.fromRows(rows);
}

export async function runCli(args: string[], config: AppConfig = loadConfig()): Promise<number> {
  try {
    const options = parseCliArgs(args);
    const schedule = await loadSchedule(options, config);
    const cutoff = options.cutoffDate ?? computeCutoffDate(new Date(), config.cutoffDays);
    const request = resolveSwap(schedule, options.gameId, cutoff);
    const outputPath = await writeSwapCsv(request, options.outputDir ?? config.outputDir);
    for (const line of formatSwapReport(request, outputPath)) {
      console.log(line);
    }
    return 0;
  } catch (error) {
    if (error instanceof PastCutoffError) {
      console.error(`Game date is before cut off date of ${error.request.cutoffDate}`);
      console.error('No point in continuing');
      return 1;
    }
    console.error(getErrorMessage(error));
    return 1;
  }
}
