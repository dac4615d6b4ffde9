/**
 * Probability Conversion
 *
 * American odds → implied probability, and a Normal(mu, sigma) model over the
 * projected home-minus-away margin for win and cover probabilities.
 *
 * Missing inputs propagate as null; nothing here throws for absent data.
 */

import { DEFAULT_BETSCORE_CONFIG, SigmaConfig } from '../config/betscore-config';

/**
 * Convert American odds to implied probability.
 * Does not remove vigorish, so the two sides of a market will not sum to 1.
 *
 * @example
 * americanToProbability(-110) // 0.5238
 * americanToProbability(150)  // 0.4
 */
export function americanToProbability(odds?: number | null): number | null {
  if (odds == null) return null;

  try {
    const o = Number(odds);
    if (!Number.isFinite(o)) return null;

    if (o < 0) {
      return (-o) / ((-o) + 100);
    }
    return 100 / (o + 100);
  } catch (error) {
    console.warn('[probability] Could not convert odds to probability:', odds, error);
    return null;
  }
}

/**
 * Error function, Abramowitz & Stegun 7.1.26 (|error| < 1.5e-7).
 * erf(0) is exactly 0 so an even matchup maps to exactly 0.5.
 */
export function erf(x: number): number {
  if (x === 0) return 0;

  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  const z = Math.abs(x);
  const t = 1.0 / (1.0 + p * z);
  const y = 1.0 - ((((a5 * t + a4) * t + a3) * t + a2) * t + a1) * t * Math.exp(-z * z);

  return sign * y;
}

/**
 * Standard normal CDF
 */
export function normalCdf(x: number): number {
  return 0.5 * (1 + erf(x / Math.SQRT2));
}

/**
 * Margin standard deviation. Higher totals mean more variance.
 * max(floor, total / divisor) when a nonzero total is known, otherwise the fallback.
 */
export function modelSigma(
  total?: number | null,
  sigma: SigmaConfig = DEFAULT_BETSCORE_CONFIG.sigma
): number {
  if (total == null || total === 0 || Number.isNaN(total)) {
    return sigma.fallback;
  }
  return Math.max(sigma.floor, total / sigma.totalDivisor);
}

/**
 * P(home margin > 0) under Normal(projHome - projAway, sigma)
 */
export function modelWinProbability(
  projHome: number | null | undefined,
  projAway: number | null | undefined,
  total?: number | null,
  sigma: SigmaConfig = DEFAULT_BETSCORE_CONFIG.sigma
): number | null {
  if (projHome == null || projAway == null) return null;

  const mu = projHome - projAway;
  const sd = modelSigma(total, sigma);

  return 1 - normalCdf((0 - mu) / sd);
}

/**
 * P(home margin > -spreadHome).
 * spreadHome is negative when home is favored (home -3.5 must win by 4+).
 */
export function modelCoverProbability(
  projHome: number | null | undefined,
  projAway: number | null | undefined,
  spreadHome: number | null | undefined,
  total?: number | null,
  sigma: SigmaConfig = DEFAULT_BETSCORE_CONFIG.sigma
): number | null {
  if (projHome == null || projAway == null || spreadHome == null) return null;

  const mu = projHome - projAway;
  const threshold = -spreadHome;
  const sd = modelSigma(total, sigma);

  return 1 - normalCdf((threshold - mu) / sd);
}
