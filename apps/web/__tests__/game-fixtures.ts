/**
 * Test fixtures: game records shaped like validated GameInput
 */

import type { GameInput } from '../lib/schemas/game-input';

export function makeGame(overrides: Partial<GameInput> = {}): GameInput {
  return {
    game_id: 'G1',
    league: 'NFL',
    date: '2025-10-12',
    home_team: 'Home Hawks',
    away_team: 'Road Rams',
    projection: { proj_home_pts: 24, proj_away_pts: 20, proj_total: 44 },
    market_lines: [],
    splits: [],
    experts: [],
    injuries: [],
    ...overrides,
  };
}

/**
 * Home 24 / away 20, total 44, ML home -150, spread home -3.5 at -110,
 * experts 3-1 on both markets, ML splits 60% public / 75% money, no injuries
 */
export function makeReferenceGame(overrides: Partial<GameInput> = {}): GameInput {
  return makeGame({
    market_lines: [
      { market: 'moneyline', option: 'home', current_line: -150 },
      { market: 'moneyline', option: 'away', current_line: 130 },
      { market: 'spread', option: 'home', current_line: -3.5, current_price: -110 },
    ],
    splits: [{ market: 'moneyline', option: 'home', public_pct: 60, money_pct: 75 }],
    experts: [
      { market: 'moneyline', option: 'home', count: 3 },
      { market: 'moneyline', option: 'away', count: 1 },
      { market: 'spread', option: 'home', count: 3 },
      { market: 'spread', option: 'away', count: 1 },
    ],
    ...overrides,
  });
}
