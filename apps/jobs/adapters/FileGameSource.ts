/**
 * File Game Source
 *
 * Reads a { games: [...] } JSON batch from a local data directory.
 * Used for slates exported by upstream tooling and for development.
 */

import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { GameInput, parseBatch } from '../../web/lib/schemas/game-input';
import { GameSourceAdapter } from './GameSourceAdapter';

export interface FileGameSourceConfig {
  dataPath: string;
  /** File name pattern; {date} is replaced by the slate date */
  fileFormat: string;
}

export class GameFileError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'GameFileError';
  }
}

/**
 * Read and validate one batch file
 */
export function readGamesFile(filePath: string): GameInput[] {
  if (!existsSync(filePath)) {
    throw new GameFileError(`Games file not found: ${filePath}`, filePath);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new GameFileError(
      `Games file is not valid JSON: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
      filePath
    );
  }

  const parsed = parseBatch(payload);
  if (!parsed.success) {
    const details = parsed.issues
      .slice(0, 5)
      .map(issue => `${issue.loc.join('.')}: ${issue.msg}`)
      .join('; ');
    throw new GameFileError(
      `Games file failed validation (${parsed.issues.length} issues): ${details}`,
      filePath
    );
  }

  return parsed.games;
}

export class FileGameSource implements GameSourceAdapter {
  private dataPath: string;
  private fileFormat: string;

  constructor(config: FileGameSourceConfig) {
    this.dataPath = config.dataPath;
    this.fileFormat = config.fileFormat;
  }

  getName(): string {
    return 'File Game Source';
  }

  async isAvailable(): Promise<boolean> {
    return existsSync(this.dataPath);
  }

  resolvePath(date: string): string {
    return path.join(this.dataPath, this.fileFormat.replace('{date}', date));
  }

  async getGames(date: string): Promise<GameInput[]> {
    const filePath = this.resolvePath(date);
    const games = readGamesFile(filePath);
    console.log(`   [FILE] Loaded ${games.length} games from ${filePath}`);
    return games;
  }
}
