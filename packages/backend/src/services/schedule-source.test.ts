import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { RemoteScheduleRecord } from '@game-swap/shared';
import {
  RemoteScheduleSource,
  CsvFileScheduleSource,
  StaticScheduleSource,
  decodeEnvelope,
  saveScheduleCsv,
  scheduleSourceFromConfig,
} from './schedule-source.js';
import { ScheduleSourceError } from '../errors.js';
import { ScheduleSet } from './schedule-set.js';
import { resolveSwap } from './swap-resolver.js';

const SCHEDULE_URL = 'https://schedule.example.test/games';

function createRecord(overrides: Partial<RemoteScheduleRecord> = {}): RemoteScheduleRecord {
  return {
    id: '1',
    gameID: 'HLU1501',
    gameDate: '2025-03-10',
    gameTime: '18:30',
    venue: 'Civic Arena, Rink 2',
    division: 'U15 A',
    homeTeam: 'Cougars 1',
    awayTeam: 'Hawks (2)',
    ...overrides,
  };
}

function envelope(records: unknown): string {
  const data = Buffer.from(JSON.stringify(records), 'utf8').toString('base64');
  return JSON.stringify({ id: 7, data });
}

function fakeFetch(body: string, status = 200) {
  const calls: string[] = [];
  const fn = async (url: string) => {
    calls.push(url);
    return new Response(body, { status });
  };
  return { fn, calls };
}

describe('decodeEnvelope', () => {
  it('decodes the base64 list of games', () => {
    const records = decodeEnvelope(envelope([createRecord()]), SCHEDULE_URL);
    expect(records).toEqual([createRecord()]);
  });

  it('rejects a body that is not JSON', () => {
    expect(() => decodeEnvelope('<html>', SCHEDULE_URL)).toThrow(ScheduleSourceError);
  });

  it('rejects an envelope without data', () => {
    expect(() => decodeEnvelope('{"id":1}', SCHEDULE_URL)).toThrow('Schedule response has no data field');
  });

  it('rejects data that is not base64', () => {
    expect(() => decodeEnvelope('{"id":1,"data":"***"}', SCHEDULE_URL)).toThrow(
      'Schedule data is not valid base64'
    );
  });

  it('rejects decoded data that is not a list', () => {
    expect(() => decodeEnvelope(envelope({ games: [] }), SCHEDULE_URL)).toThrow(
      'Decoded schedule is not a list of games'
    );
  });

  it('rejects entries that are not games', () => {
    expect(() => decodeEnvelope(envelope([createRecord(), 42]), SCHEDULE_URL)).toThrow(
      'Decoded schedule entry 1 is not a game'
    );
  });

  it('keeps games with null or missing fields', () => {
    const partial = { gameID: 'HLU1503', gameDate: null };
    expect(decodeEnvelope(envelope([createRecord(), partial]), SCHEDULE_URL)).toEqual([createRecord(), partial]);
  });
});

describe('RemoteScheduleSource', () => {
  it('returns positional rows in API order', async () => {
    const { fn, calls } = fakeFetch(
      envelope([createRecord(), createRecord({ gameID: 'HLU1502', homeTeam: 'Lynx', awayTeam: 'Bears' })])
    );
    const rows = await new RemoteScheduleSource(SCHEDULE_URL, fn).load();

    expect(calls).toEqual([SCHEDULE_URL]);
    expect(rows).toEqual([
      ['U15 A', 'HLU1501', '2025-03-10', '18:30', 'Civic Arena, Rink 2', 'Cougars 1', 'Hawks (2)'],
      ['U15 A', 'HLU1502', '2025-03-10', '18:30', 'Civic Arena, Rink 2', 'Lynx', 'Bears'],
    ]);
  });

  it('turns incomplete games into empty fields that swap searches skip', async () => {
    const { fn } = fakeFetch(
      envelope([
        createRecord({ gameID: 'G1', division: 'U13 A', gameDate: '2025-03-10', homeTeam: 'A', awayTeam: 'B' }),
        createRecord({ gameID: 'G2', division: 'U15 A', gameDate: '2025-03-12', homeTeam: 'C', awayTeam: 'D' }),
        { id: '3', gameID: 'G3', gameDate: '', gameTime: null, venue: null, division: 'U15 B', homeTeam: 'A' },
      ])
    );
    const rows = await new RemoteScheduleSource(SCHEDULE_URL, fn).load();

    expect(rows[2]).toEqual(['U15 B', 'G3', '', '', '', 'A', '']);
    const request = resolveSwap(ScheduleSet.fromRows(rows), 'G1', '2025-03-01');
    expect(request.candidates.map((c) => c.gameId)).toEqual(['G2']);
    expect(request.excludeDates).toEqual(['2025-03-10']);
  });

  it('reports HTTP failures as schedule source errors', async () => {
    const { fn } = fakeFetch('nope', 503);
    await expect(new RemoteScheduleSource(SCHEDULE_URL, fn).load()).rejects.toThrow(ScheduleSourceError);
  });

  it('reports network failures as schedule source errors', async () => {
    const source = new RemoteScheduleSource(SCHEDULE_URL, async () => {
      throw new Error('connection refused');
    });
    await expect(source.load()).rejects.toThrow('Failed to fetch schedule: connection refused');
  });

  it('describes itself by URL', () => {
    expect(new RemoteScheduleSource(SCHEDULE_URL).description).toBe(SCHEDULE_URL);
  });
});

describe('StaticScheduleSource', () => {
  it('returns a copy of its rows', async () => {
    const rows = [['U9 A', 'G1', '2025-03-10', '', '', 'A', 'B']];
    const source = new StaticScheduleSource(rows);
    const loaded = await source.load();
    expect(loaded).toEqual(rows);
    expect(loaded).not.toBe(rows);
  });
});

describe('schedule files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'game-swap-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('saves a schedule with a header and reads it back', async () => {
    const file = path.join(dir, 'nested', 'schedule.csv');
    const rows = [['U15 A', 'HLU1501', '2025-03-10', '18:30', 'Civic Arena, Rink 2', 'Cougars 1', 'Hawks (2)']];

    await saveScheduleCsv(rows, file);

    expect(await fs.readFile(file, 'utf8')).toBe(
      'Division,GameID,Date,Time,Arena,Home Team,Away Team\n' +
        'U15 A,HLU1501,2025-03-10,18:30,"Civic Arena, Rink 2",Cougars 1,Hawks (2)\n'
    );
    expect(await new CsvFileScheduleSource(file).load()).toEqual([
      ['Division', 'GameID', 'Date', 'Time', 'Arena', 'Home Team', 'Away Team'],
      ...rows,
    ]);
  });

  it('reads back a saved game whose fields contain line breaks', async () => {
    const file = path.join(dir, 'schedule.csv');
    const rows = [
      ['U13 A', 'G1', '2025-03-10', '18:00', 'Rink', 'A\nB', 'C'],
      ['U13 A', 'G2', '2025-03-11', '18:00', 'Rink', 'D', 'E'],
    ];

    await saveScheduleCsv(rows, file);

    const loaded = await new CsvFileScheduleSource(file).load();
    expect(loaded).toEqual([['Division', 'GameID', 'Date', 'Time', 'Arena', 'Home Team', 'Away Team'], ...rows]);
  });

  it('reports a missing file as a schedule source error', async () => {
    const source = new CsvFileScheduleSource(path.join(dir, 'missing.csv'));
    await expect(source.load()).rejects.toThrow(ScheduleSourceError);
  });
});

describe('scheduleSourceFromConfig', () => {
  it('prefers the remote API when a URL is configured', () => {
    const source = scheduleSourceFromConfig({ scheduleUrl: SCHEDULE_URL, scheduleFile: 'schedule.csv' });
    expect(source).toBeInstanceOf(RemoteScheduleSource);
    expect(source.description).toBe(SCHEDULE_URL);
  });

  it('falls back to the local file', () => {
    const source = scheduleSourceFromConfig({ scheduleFile: 'schedule.csv' });
    expect(source).toBeInstanceOf(CsvFileScheduleSource);
    expect(source.description).toBe('schedule.csv');
  });
});
