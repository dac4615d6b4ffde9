/**
 * Edge & Composite Scoring
 *
 * BetScore blends four signals from the home side's perspective:
 * - Edge vs market (model probability minus implied probability), clamped to ±edgeCap
 * - Expert consensus, (home - away) / max(1, home + away)
 * - Sharp delta, money % minus public %
 * - Injury differential, away total minus home total
 *
 * An unknown edge or sharp delta scores as neutral (0), it is not dropped from the formula.
 */

import { BetScoreConfig, DEFAULT_BETSCORE_CONFIG } from '../config/betscore-config';

export interface BetScoreSignals {
  edge: number | null;
  expertsHome: number;
  expertsAway: number;
  sharpDeltaHome: number | null;
  injuryHome: number;
  injuryAway: number;
}

/**
 * Round to `places` decimals on the exact binary value; exact ties go to the even digit
 * (2.8125 → 2.812, -0.9375 → -0.938, 1.005 at 2 places → 1).
 */
export function roundTo(value: number, places: number = 3): number {
  const factor = 10 ** places;

  // Exact decimal ties are the odd multiples of 2^-(places + 1)
  const halfSteps = value * 2 ** (places + 1);
  if (Number.isInteger(halfSteps) && halfSteps % 2 !== 0) {
    const lower = Math.floor(value * factor);
    return (lower % 2 === 0 ? lower : lower + 1) / factor;
  }

  return Number(value.toFixed(places));
}

export function roundOrNull(value: number | null | undefined, places: number = 3): number | null {
  if (value == null || !Number.isFinite(value)) return null;
  return roundTo(value, places);
}

/**
 * Clamp v to [a, b]; unknown or NaN counts as 0
 */
export function clamp(v: number | null | undefined, a: number, b: number): number {
  if (v == null || Number.isNaN(v)) return 0;
  return Math.max(a, Math.min(b, v));
}

/**
 * Model probability minus market-implied probability
 */
export function computeEdge(modelProb: number | null, impliedProb: number | null): number | null {
  if (modelProb === null || impliedProb === null) return null;
  return modelProb - impliedProb;
}

/**
 * Money % minus public (ticket) %; positive means money is heavier than tickets on that side
 */
export function sharpDelta(moneyPct: number | null, publicPct: number | null): number | null {
  if (moneyPct === null || publicPct === null) return null;
  return moneyPct - publicPct;
}

export function expertConsensus(expertsHome: number, expertsAway: number): number {
  return (expertsHome - expertsAway) / Math.max(1, expertsHome + expertsAway);
}

export function computeBetScore(
  signals: BetScoreSignals,
  config: BetScoreConfig = DEFAULT_BETSCORE_CONFIG
): number {
  const { weights, edgeCap } = config;

  const score =
    weights.edge * (clamp(signals.edge, -edgeCap, edgeCap) / edgeCap) +
    weights.experts * expertConsensus(signals.expertsHome, signals.expertsAway) +
    weights.sharp * ((signals.sharpDeltaHome ?? 0) / 100) +
    weights.injury * (signals.injuryAway - signals.injuryHome);

  return roundTo(score, 3);
}

/**
 * Moneyline BetScore (edge = model home win − implied home ML probability)
 */
export function computeBetScoreML(
  signals: BetScoreSignals,
  config: BetScoreConfig = DEFAULT_BETSCORE_CONFIG
): number {
  return computeBetScore(signals, config);
}

/**
 * ATS BetScore (edge = model home cover − implied home cover probability)
 */
export function computeBetScoreATS(
  signals: BetScoreSignals,
  config: BetScoreConfig = DEFAULT_BETSCORE_CONFIG
): number {
  return computeBetScore(signals, config);
}
