import type { GameRecord, ScheduleRow } from '@game-swap/shared';
import { SCHEDULE_COLUMNS, REQUIRED_FIELD_COUNT } from '@game-swap/shared';
import { sameTeam, addUnique } from './name-normalizer.js';
import { parseScheduleDate } from '../utils/date.js';

function field(row: ScheduleRow, index: number): string {
  return row[index] ?? '';
}

/**
 * Build a game record from a positional schedule row.
 * Short rows are kept (with empty fields) and later rejected by isWellFormed.
 */
export function rowToGameRecord(row: ScheduleRow): GameRecord {
  const status = row[SCHEDULE_COLUMNS.status];
  return Object.freeze({
    division: field(row, SCHEDULE_COLUMNS.division),
    gameId: field(row, SCHEDULE_COLUMNS.gameId),
    date: field(row, SCHEDULE_COLUMNS.date),
    time: field(row, SCHEDULE_COLUMNS.time),
    venue: field(row, SCHEDULE_COLUMNS.venue),
    homeTeam: field(row, SCHEDULE_COLUMNS.homeTeam),
    awayTeam: field(row, SCHEDULE_COLUMNS.awayTeam),
    ...(status !== undefined ? { status } : {}),
    fields: Object.freeze([...row]),
  });
}

/**
 * A header line or a corrupt line has too few fields or no readable date
 */
export function isWellFormed(record: GameRecord): boolean {
  return record.fields.length >= REQUIRED_FIELD_COUNT && parseScheduleDate(record.date) !== null;
}

/**
 * Ordered, read-only collection of games. Filtering returns a new set.
 */
export class ScheduleSet implements Iterable<GameRecord> {
  readonly records: readonly GameRecord[];

  constructor(records: readonly GameRecord[]) {
    this.records = Object.freeze([...records]);
  }

  static fromRows(rows: readonly ScheduleRow[]): ScheduleSet {
    return new ScheduleSet(rows.map(rowToGameRecord));
  }

  get size(): number {
    return this.records.length;
  }

  [Symbol.iterator](): Iterator<GameRecord> {
    return this.records[Symbol.iterator]();
  }

  /**
   * First game with the given id
   */
  findById(gameId: string): GameRecord | undefined {
    return this.records.find((record) => record.gameId === gameId);
  }

  filter(predicate: (record: GameRecord) => boolean): ScheduleSet {
    return new ScheduleSet(this.records.filter(predicate));
  }

  /**
   * True when the named team plays home or away in the game
   */
  static containsTeam(record: GameRecord, name: string): boolean {
    return sameTeam(record.homeTeam, name) || sameTeam(record.awayTeam, name);
  }
}

/**
 * Distinct normalized team names of the well-formed games, in first-seen order
 */
export function listTeams(schedule: ScheduleSet): string[] {
  let teams: string[] = [];
  for (const record of schedule) {
    if (!isWellFormed(record)) continue;
    teams = addUnique(teams, record.homeTeam);
    teams = addUnique(teams, record.awayTeam);
  }
  return teams;
}

/**
 * Distinct division labels of the well-formed games, in first-seen order
 */
export function listDivisionLabels(schedule: ScheduleSet): string[] {
  const labels = new Set<string>();
  for (const record of schedule) {
    if (isWellFormed(record)) {
      labels.add(record.division);
    }
  }
  return [...labels];
}
