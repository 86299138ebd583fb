import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { SwapRequest } from '@game-swap/shared';
import { swapCandidatesToCsv, swapExportFilename, writeSwapCsv } from './swap-export.js';
import { rowToGameRecord } from './schedule-set.js';
import { OutputWriteError } from '../errors.js';

function createRequest(overrides: Partial<SwapRequest> = {}): SwapRequest {
  return {
    gameId: 'HLU1501',
    date: '2025-03-10',
    homeTeam: 'COUGARS 1',
    awayTeam: 'HAWKS',
    division: { name: 'U15 A', description: 'U15 A -> U13 A, U15 A-B, U18 A-B' },
    cutoffDate: '2025-03-01',
    excludeDates: ['2025-03-10'],
    excludeTeams: ['COUGARS 1', 'HAWKS'],
    candidates: [
      rowToGameRecord(['U15 B', 'HLU1520', '2025-03-14', '19:00', 'Civic Arena, Rink 2', 'Lynx (1)', 'Bears']),
      rowToGameRecord(['U18 A', 'HLU1801', '2025-03-15', '08:00', 'North Rink', 'Wolves', 'Owls']),
    ],
    ...overrides,
  };
}

describe('swapCandidatesToCsv', () => {
  it('writes a header and one line per candidate', () => {
    expect(swapCandidatesToCsv(createRequest())).toBe(
      'Division,Game ID,Date,Time,Arena,Home Team,Away Team\n' +
        'U15 B,HLU1520,2025-03-14,19:00,"Civic Arena, Rink 2",Lynx (1),Bears\n' +
        'U18 A,HLU1801,2025-03-15,08:00,North Rink,Wolves,Owls\n'
    );
  });

  it('writes only the header when there are no candidates', () => {
    expect(swapCandidatesToCsv(createRequest({ candidates: [] }))).toBe(
      'Division,Game ID,Date,Time,Arena,Home Team,Away Team\n'
    );
  });
});

describe('swapExportFilename', () => {
  it('uses the game id', () => {
    expect(swapExportFilename('HLU1501')).toBe('HLU1501.csv');
  });

  it('replaces characters that are unsafe in filenames', () => {
    expect(swapExportFilename('../U13 A/7')).toBe('___U13_A_7.csv');
  });
});

describe('writeSwapCsv', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'game-swap-out-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the candidate file into the directory', async () => {
    const filePath = await writeSwapCsv(createRequest(), dir);
    expect(filePath).toBe(path.join(dir, 'HLU1501.csv'));
    expect(await fs.readFile(filePath, 'utf8')).toBe(swapCandidatesToCsv(createRequest()));
  });

  it('reports write failures as output errors', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');
    await expect(writeSwapCsv(createRequest(), blocker)).rejects.toThrow(OutputWriteError);
  });
});
