import type { SwapErrorCode, SwapRequest } from '@game-swap/shared';

/**
 * Base error for every failure of a swap resolution.
 * These are caused by the request or by the schedule content, never by I/O.
 */
export class SwapError extends Error {
  constructor(
    message: string,
    public readonly code: SwapErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SwapError';
  }
}

/** The requested game id is not in the schedule */
export class GameNotFoundError extends SwapError {
  constructor(public readonly gameId: string) {
    super(`Game ${gameId} not found in schedule`, 'GAME_NOT_FOUND', { gameId });
    this.name = 'GameNotFoundError';
  }
}

/**
 * The game is on or before the cutoff date, so it is too late to swap it.
 * Carries the request with no candidates so callers can still show the target.
 */
export class PastCutoffError extends SwapError {
  constructor(public readonly request: SwapRequest) {
    super(
      `Game ${request.gameId} on ${request.date} is not after cut off date ${request.cutoffDate}`,
      'PAST_CUTOFF',
      { gameId: request.gameId, date: request.date, cutoffDate: request.cutoffDate }
    );
    this.name = 'PastCutoffError';
  }
}

/** The division label matched no division rule, or more than one */
export class AmbiguousDivisionError extends SwapError {
  constructor(
    public readonly label: string,
    public readonly matches: string[]
  ) {
    super(
      matches.length === 0
        ? `Division "${label}" does not match any known division`
        : `Division "${label}" matches several divisions: ${matches.join(', ')}`,
      'AMBIGUOUS_DIVISION',
      { label, matches }
    );
    this.name = 'AmbiguousDivisionError';
  }
}

/** The target game's own date cannot be read */
export class MalformedTargetDateError extends SwapError {
  constructor(
    public readonly gameId: string,
    public readonly date: string
  ) {
    super(`Game ${gameId} has an unreadable date "${date}"`, 'MALFORMED_TARGET_DATE', {
      gameId,
      date,
    });
    this.name = 'MalformedTargetDateError';
  }
}

/** A caller-supplied cutoff date is not YYYY-MM-DD */
export class InvalidCutoffDateError extends SwapError {
  constructor(public readonly cutoffDate: string) {
    super(`Cut off date "${cutoffDate}" must be YYYY-MM-DD`, 'INVALID_CUTOFF_DATE', {
      cutoffDate,
    });
    this.name = 'InvalidCutoffDateError';
  }
}

/** The division table itself is broken; raised while building a registry */
export class DivisionConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DivisionConfigError';
  }
}

/** The schedule could not be fetched, read or decoded */
export class ScheduleSourceError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ScheduleSourceError';
  }
}

/** A result file could not be written */
export class OutputWriteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OutputWriteError';
  }
}

/**
 * Type guard for resolution errors (as opposed to I/O or programming errors)
 */
export function isSwapError(error: unknown): error is SwapError {
  return error instanceof SwapError;
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
