/**
 * Signal Extraction
 *
 * Read-only lookups over a game's lists.
 *
 * NOTE: lines and splits take the FIRST match (later duplicates are ignored),
 * while experts and injuries SUM every match. Keep the asymmetry.
 */

import type {
  ExpertItem,
  ExpertMarket,
  InjuryItem,
  LineItem,
  Market,
  MarketOption,
  Side,
  SplitItem,
} from '../schemas/game-input';

export type SplitField = 'public_pct' | 'money_pct';

export function findLine(lines: readonly LineItem[], market: Market, option: MarketOption): LineItem | null {
  return lines.find(l => l.market === market && l.option === option) ?? null;
}

export function sumExperts(experts: readonly ExpertItem[], market: ExpertMarket, option: Side): number {
  return experts
    .filter(e => e.market === market && e.option === option)
    .reduce((sum, e) => sum + Math.trunc(e.count), 0);
}

export function splitPct(
  splits: readonly SplitItem[],
  market: Market,
  option: MarketOption,
  field: SplitField
): number | null {
  const split = splits.find(s => s.market === market && s.option === option);
  if (!split) return null;
  return split[field] ?? null;
}

/**
 * Crude injury load: sum of impact over players whose team matches exactly (no name normalization)
 */
export function injurySum(injuries: readonly InjuryItem[], team: string): number {
  return injuries
    .filter(i => i.team === team)
    .reduce((sum, i) => sum + (i.impact_0to1 ?? 0), 0);
}
