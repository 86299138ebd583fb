/**
 * A raw schedule row, fields addressed by position:
 * division, game id, date, time, venue, home team, away team, status
 */
export type ScheduleRow = readonly string[];

/**
 * Column positions within a ScheduleRow
 */
export const SCHEDULE_COLUMNS = {
  division: 0,
  gameId: 1,
  date: 2,
  time: 3,
  venue: 4,
  homeTeam: 5,
  awayTeam: 6,
  status: 7,
} as const;

/**
 * Number of positions a row must carry to be a usable game
 */
export const REQUIRED_FIELD_COUNT = 7;

/**
 * GameRecord represents one scheduled game as it appears in the league schedule.
 * Team names are kept raw (they may carry a score annotation such as "(3)").
 */
export interface GameRecord {
  readonly division: string;
  readonly gameId: string;
  readonly date: string; // YYYY-MM-DD, unvalidated
  readonly time: string;
  readonly venue: string;
  readonly homeTeam: string;
  readonly awayTeam: string;
  readonly status?: string;
  readonly fields: ScheduleRow;
}

/**
 * A game as published by the league's schedule API (decoded from the base64 envelope)
 */
export interface RemoteScheduleRecord {
  id: string;
  gameID: string;
  gameDate: string;
  gameTime: string;
  venue: string;
  division: string;
  homeTeam: string;
  awayTeam: string;
}

/**
 * Outer envelope returned by the schedule API; `data` is base64-encoded JSON
 */
export interface RemoteScheduleEnvelope {
  id: number;
  data: string;
}
