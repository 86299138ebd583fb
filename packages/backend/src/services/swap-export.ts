import fs from 'node:fs/promises';
import path from 'node:path';
import type { GameRecord, SwapRequest } from '@game-swap/shared';
import { SWAP_CSV_HEADERS } from '@game-swap/shared';
import { toCsv } from '../utils/csv.js';
import { OutputWriteError, getErrorMessage } from '../errors.js';

function candidateToRow(game: GameRecord): string[] {
  return [game.division, game.gameId, game.date, game.time, game.venue, game.homeTeam, game.awayTeam];
}

/**
 * Swap candidates as CSV, header first
 */
export function swapCandidatesToCsv(request: SwapRequest): string {
  return toCsv([SWAP_CSV_HEADERS, ...request.candidates.map(candidateToRow)]);
}

/**
 * Sanitize a game id for use in a filename
 */
export function swapExportFilename(gameId: string): string {
  return `${gameId.replace(/[^a-zA-Z0-9_-]/g, '_')}.csv`;
}

/**
 * Write <gameId>.csv into `dir` and return its path
 */
export async function writeSwapCsv(request: SwapRequest, dir: string): Promise<string> {
  const filePath = path.join(dir, swapExportFilename(request.gameId));
  console.log('writeSwapCsv: Creating output file', filePath);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, swapCandidatesToCsv(request), 'utf8');
  } catch (error) {
    throw new OutputWriteError(`Failed to write ${filePath}: ${getErrorMessage(error)}`, filePath, {
      cause: error,
    });
  }
  return filePath;
}
