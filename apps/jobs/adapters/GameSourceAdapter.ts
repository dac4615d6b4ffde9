/**
 * Game Source Adapter Interface
 *
 * Defines the contract for sources that hand the analyzer a batch of games
 * for one slate date.
 */

import type { GameInput } from '../../web/lib/schemas/game-input';

export interface GameSourceAdapter {
  /**
   * Fetch the validated games for a slate date (YYYY-MM-DD)
   */
  getGames(date: string): Promise<GameInput[]>;

  /**
   * Get the name of this adapter
   */
  getName(): string;

  /**
   * Check if this adapter is available/configured
   */
  isAvailable(): Promise<boolean>;
}

export interface AdapterConfig {
  provider: string;
  enabled: boolean;
  config: Record<string, unknown>;
}

export interface DataSourcesConfig {
  adapters: Record<string, AdapterConfig>;
  defaultAdapter: string;
}
