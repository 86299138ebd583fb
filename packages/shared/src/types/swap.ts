import type { GameRecord } from './game-record.js';
import type { DivisionSummary } from './division.js';

/**
 * SwapRequest holds the outcome of one swap search for a single game.
 * Exclusion lists are the reasoning behind the candidate list.
 */
export interface SwapRequest {
  gameId: string;
  date: string;
  homeTeam: string; // normalized
  awayTeam: string; // normalized
  division: DivisionSummary;
  cutoffDate: string;
  excludeDates: string[]; // dates the target's teams already play
  excludeTeams: string[]; // normalized teams already playing on the target date
  candidates: GameRecord[]; // schedule order
}

export interface ResolveSwapInput {
  gameId: string;
  cutoffDate?: string; // YYYY-MM-DD, defaults to today + configured days
}

export type SwapErrorCode =
  | 'GAME_NOT_FOUND'
  | 'PAST_CUTOFF'
  | 'AMBIGUOUS_DIVISION'
  | 'MALFORMED_TARGET_DATE'
  | 'INVALID_CUTOFF_DATE';

export interface ApiErrorResponse {
  error: string;
  code?: SwapErrorCode | 'SCHEDULE_SOURCE' | 'OUTPUT_WRITE';
  request?: SwapRequest;
}
