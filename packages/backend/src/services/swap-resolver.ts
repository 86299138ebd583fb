import type { GameRecord, SwapRequest } from '@game-swap/shared';
import { ScheduleSet, isWellFormed } from './schedule-set.js';
import { normalizeTeamName } from './name-normalizer.js';
import { DivisionRegistry, defaultDivisionRegistry, toDivisionSummary } from './division-registry.js';
import { parseScheduleDate } from '../utils/date.js';
import {
  GameNotFoundError,
  InvalidCutoffDateError,
  MalformedTargetDateError,
  PastCutoffError,
} from '../errors.js';

/**
 * Dates on which either team of the game being swapped already plays,
 * and every team already playing on the day of that game.
 * Scans the whole schedule: a team's commitments in divisions it cannot
 * swap with still block those dates.
 */
export function computeExclusions(
  schedule: ScheduleSet,
  target: { date: string; homeTeam: string; awayTeam: string }
): { excludeDates: string[]; excludeTeams: string[] } {
  const excludeDates = new Set<string>();
  const excludeTeams = new Set<string>();

  for (const game of schedule) {
    if (!isWellFormed(game)) continue;

    if (ScheduleSet.containsTeam(game, target.homeTeam) || ScheduleSet.containsTeam(game, target.awayTeam)) {
      excludeDates.add(game.date);
    }

    if (game.date === target.date) {
      excludeTeams.add(normalizeTeamName(game.homeTeam));
      excludeTeams.add(normalizeTeamName(game.awayTeam));
    }
  }

  return { excludeDates: [...excludeDates], excludeTeams: [...excludeTeams] };
}

/**
 * Find the games that could be swapped with `targetGameId`.
 *
 * 1. locate the game and its division
 * 2. keep future games in divisions the target may swap with
 * 3. collect dates the target's teams play and teams busy on the target date
 * 4. drop games on those dates or involving those teams
 *
 * Games on or before `cutoffDate` are never candidates, and a target on or
 * before it raises PastCutoffError.
 */
export function resolveSwap(
  schedule: ScheduleSet,
  targetGameId: string,
  cutoffDate: string,
  registry: DivisionRegistry = defaultDivisionRegistry
): SwapRequest {
  const cutoff = parseScheduleDate(cutoffDate);
  if (cutoff === null) {
    throw new InvalidCutoffDateError(cutoffDate);
  }

  const target = schedule.findById(targetGameId);
  if (!target) {
    throw new GameNotFoundError(targetGameId);
  }

  const date = parseScheduleDate(target.date);
  if (date === null) {
    throw new MalformedTargetDateError(targetGameId, target.date);
  }

  const division = registry.resolve(target.division);
  console.log(
    `resolveSwap: Found game ${targetGameId} on ${date} (${target.homeTeam} vs ${target.awayTeam}), division ${division.name}`
  );

  const request: SwapRequest = {
    gameId: targetGameId,
    date,
    homeTeam: normalizeTeamName(target.homeTeam),
    awayTeam: normalizeTeamName(target.awayTeam),
    division: toDivisionSummary(division),
    cutoffDate: cutoff,
    excludeDates: [],
    excludeTeams: [],
    candidates: [],
  };

  if (date <= cutoff) {
    console.log(`resolveSwap: Game date ${date} is not after cut off date ${cutoff}`);
    throw new PastCutoffError(request);
  }

  console.log('resolveSwap: Searching for swaps with', division.description);
  const universe = schedule.filter(
    (game) => isWellFormed(game) && game.date > cutoff && division.isCompatible(game.division)
  );
  console.log('resolveSwap:', universe.size, 'games after cut off date in compatible divisions');

  const { excludeDates, excludeTeams } = computeExclusions(schedule, request);
  const blockedDates = new Set(excludeDates);
  const blockedTeams = new Set(excludeTeams);

  const isAvailable = (game: GameRecord): boolean =>
    !blockedDates.has(game.date) &&
    !blockedTeams.has(normalizeTeamName(game.homeTeam)) &&
    !blockedTeams.has(normalizeTeamName(game.awayTeam));

  const candidates = universe.filter(isAvailable).records;
  console.log('resolveSwap: Found', candidates.length, 'potential matches');

  return {
    ...request,
    excludeDates,
    excludeTeams,
    candidates: [...candidates],
  };
}
