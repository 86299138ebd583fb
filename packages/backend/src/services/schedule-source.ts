import fs from 'node:fs/promises';
import path from 'node:path';
import type { RemoteScheduleEnvelope, RemoteScheduleRecord, ScheduleRow } from '@game-swap/shared';
import { SCHEDULE_CSV_HEADERS } from '@game-swap/shared';
import { ScheduleSourceError, OutputWriteError, getErrorMessage } from '../errors.js';
import { parseCsv, toCsv } from '../utils/csv.js';

/**
 * Anything that can hand over the league schedule as positional rows
 */
export interface ScheduleSource {
  readonly description: string;
  load(): Promise<ScheduleRow[]>;
}

type FetchFn = (url: string) => Promise<Response>;

/**
 * A decoded game before its fields are checked; the API sends null or omits
 * fields for unfinished entries
 */
export type LooseRemoteRecord = Partial<Record<keyof RemoteScheduleRecord, unknown>>;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isEnvelope(value: unknown): value is RemoteScheduleEnvelope {
  return isObject(value) && typeof value.data === 'string';
}

/**
 * Decode the base64 `data` field of the schedule API envelope.
 * Only the shape of the list is checked here; incomplete games become
 * malformed rows that the schedule stages skip.
 */
export function decodeEnvelope(body: string, source: string): LooseRemoteRecord[] {
  let envelope: unknown;
  try {
    envelope = JSON.parse(body);
  } catch (error) {
    throw new ScheduleSourceError(`Schedule response is not JSON: ${getErrorMessage(error)}`, source, {
      cause: error,
    });
  }
  if (!isEnvelope(envelope)) {
    throw new ScheduleSourceError('Schedule response has no data field', source);
  }

  const encoded = envelope.data.replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded) || encoded.length % 4 !== 0) {
    throw new ScheduleSourceError('Schedule data is not valid base64', source);
  }

  let records: unknown;
  try {
    records = JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'));
  } catch (error) {
    throw new ScheduleSourceError(`Decoded schedule is not JSON: ${getErrorMessage(error)}`, source, {
      cause: error,
    });
  }
  if (!Array.isArray(records)) {
    throw new ScheduleSourceError('Decoded schedule is not a list of games', source);
  }

  const invalid = records.findIndex((record) => !isObject(record));
  if (invalid !== -1) {
    throw new ScheduleSourceError(`Decoded schedule entry ${invalid} is not a game`, source);
  }
  return records.filter(isObject);
}

function text(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Position the API fields the way schedule exports lay them out.
 * Missing or non-string fields become empty strings.
 */
export function remoteRecordToRow(record: LooseRemoteRecord): ScheduleRow {
  return [
    text(record.division),
    text(record.gameID),
    text(record.gameDate),
    text(record.gameTime),
    text(record.venue),
    text(record.homeTeam),
    text(record.awayTeam),
  ];
}

/**
 * The league's schedule API: a JSON envelope wrapping base64-encoded JSON games
 */
export class RemoteScheduleSource implements ScheduleSource {
  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchFn = (url) => fetch(url)
  ) {}

  get description(): string {
    return this.url;
  }

  async load(): Promise<ScheduleRow[]> {
    console.log('RemoteScheduleSource: Downloading schedule from', this.url);
    let response: Response;
    try {
      response = await this.fetchFn(this.url);
    } catch (error) {
      throw new ScheduleSourceError(`Failed to fetch schedule: ${getErrorMessage(error)}`, this.url, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new ScheduleSourceError(
        `Failed to fetch schedule: ${response.status} ${response.statusText}`,
        this.url
      );
    }

    const records = decodeEnvelope(await response.text(), this.url);
    console.log('RemoteScheduleSource: Decoded', records.length, 'games');
    return records.map(remoteRecordToRow);
  }
}

/**
 * A schedule CSV on disk; its header line is loaded like any other row
 */
export class CsvFileScheduleSource implements ScheduleSource {
  constructor(private readonly filePath: string) {}

  get description(): string {
    return this.filePath;
  }

  async load(): Promise<ScheduleRow[]> {
    console.log('CsvFileScheduleSource: Reading schedule file', this.filePath);
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      throw new ScheduleSourceError(
        `Failed to read schedule file: ${getErrorMessage(error)}`,
        this.filePath,
        { cause: error }
      );
    }
    return parseCsv(content);
  }
}

/**
 * Fixed rows, for tests and callers that already hold the schedule
 */
export class StaticScheduleSource implements ScheduleSource {
  readonly description = 'in-memory schedule';

  constructor(private readonly rows: readonly ScheduleRow[]) {}

  async load(): Promise<ScheduleRow[]> {
    return [...this.rows];
  }
}

/**
 * Keep a local copy of a downloaded schedule, with a header line
 */
export async function saveScheduleCsv(rows: readonly ScheduleRow[], filePath: string): Promise<void> {
  console.log('saveScheduleCsv: Writing', rows.length, 'games to', filePath);
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, toCsv([SCHEDULE_CSV_HEADERS, ...rows]), 'utf8');
  } catch (error) {
    throw new OutputWriteError(`Failed to write schedule file: ${getErrorMessage(error)}`, filePath, {
      cause: error,
    });
  }
}

/**
 * The remote API when a URL is configured, otherwise the local schedule file
 */
export function scheduleSourceFromConfig(config: { scheduleUrl?: string; scheduleFile: string }): ScheduleSource {
  return config.scheduleUrl
    ? new RemoteScheduleSource(config.scheduleUrl)
    : new CsvFileScheduleSource(config.scheduleFile);
}
