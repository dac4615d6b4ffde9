/**
 * BetScore Configuration Loader
 *
 * Named weights for the composite BetScore and the sigma heuristic used by the
 * probability model. Defaults live here; a YAML file can override any subset.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';

export interface BetScoreWeights {
  edge: number;
  experts: number;
  sharp: number;
  injury: number;
}

export interface SigmaConfig {
  floor: number;
  totalDivisor: number;
  fallback: number;
}

export interface BetScoreConfig {
  weights: BetScoreWeights;
  /** Edge is clamped to ±edgeCap before scaling to [-1, 1] */
  edgeCap: number;
  sigma: SigmaConfig;
}

// Weights sum to 75; the remaining 25 is headroom for future signals (weather/schedule)
export const EDGE_WEIGHT = 35;
export const EXPERTS_WEIGHT = 15;
export const SHARP_WEIGHT = 15;
export const INJURY_WEIGHT = 10;
export const EDGE_CAP = 0.15;

export const SIGMA_FLOOR = 3.0;
export const SIGMA_TOTAL_DIVISOR = 6.0;
export const SIGMA_FALLBACK = 7.5;

export const DEFAULT_BETSCORE_CONFIG: BetScoreConfig = {
  weights: {
    edge: EDGE_WEIGHT,
    experts: EXPERTS_WEIGHT,
    sharp: SHARP_WEIGHT,
    injury: INJURY_WEIGHT,
  },
  edgeCap: EDGE_CAP,
  sigma: {
    floor: SIGMA_FLOOR,
    totalDivisor: SIGMA_TOTAL_DIVISOR,
    fallback: SIGMA_FALLBACK,
  },
};

const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/betscore-weights.yml');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  label: string,
  positive: boolean
): number {
  const raw = section[key];
  if (raw === undefined || raw === null) {
    return fallback;
  }
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new Error(`Invalid BetScore config: ${label} must be a finite number (got ${JSON.stringify(raw)})`);
  }
  if (positive && raw <= 0) {
    throw new Error(`Invalid BetScore config: ${label} must be > 0 (got ${raw})`);
  }
  return raw;
}

function sectionOf(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = parsed[key];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new Error(`Invalid BetScore config: "${key}" must be a mapping`);
  }
  return section;
}

/**
 * Parse YAML content into a full config, filling gaps from the defaults
 */
export function parseBetScoreConfig(
  content: string,
  defaults: BetScoreConfig = DEFAULT_BETSCORE_CONFIG
): BetScoreConfig {
  const loaded: unknown = yaml.load(content);

  if (loaded === undefined || loaded === null) {
    return defaults;
  }
  if (!isRecord(loaded)) {
    throw new Error('Invalid BetScore config: top level must be a mapping');
  }

  const weights = sectionOf(loaded, 'weights');
  const sigma = sectionOf(loaded, 'sigma');

  return {
    weights: {
      edge: readNumber(weights, 'edge', defaults.weights.edge, 'weights.edge', false),
      experts: readNumber(weights, 'experts', defaults.weights.experts, 'weights.experts', false),
      sharp: readNumber(weights, 'sharp', defaults.weights.sharp, 'weights.sharp', false),
      injury: readNumber(weights, 'injury', defaults.weights.injury, 'weights.injury', false),
    },
    edgeCap: readNumber(loaded, 'edge_cap', defaults.edgeCap, 'edge_cap', true),
    sigma: {
      floor: readNumber(sigma, 'floor', defaults.sigma.floor, 'sigma.floor', true),
      totalDivisor: readNumber(sigma, 'total_divisor', defaults.sigma.totalDivisor, 'sigma.total_divisor', true),
      fallback: readNumber(sigma, 'fallback', defaults.sigma.fallback, 'sigma.fallback', true),
    },
  };
}

let cachedConfig: BetScoreConfig | null = null;

/**
 * Load the BetScore configuration.
 *
 * Resolution order: explicit path, BETSCORE_CONFIG_PATH, bundled betscore-weights.yml.
 * A missing bundled file falls back to the defaults; a missing explicit file is an error.
 */
export function loadBetScoreConfig(configPath?: string): BetScoreConfig {
  const explicitPath = configPath || process.env.BETSCORE_CONFIG_PATH;

  if (!explicitPath && cachedConfig) {
    return cachedConfig;
  }

  const resolvedPath = explicitPath || DEFAULT_CONFIG_PATH;

  if (!fs.existsSync(resolvedPath)) {
    if (explicitPath) {
      throw new Error(`BetScore config not found: ${resolvedPath}`);
    }
    console.warn(`[betscore-config] ${resolvedPath} not found, using built-in defaults`);
    cachedConfig = DEFAULT_BETSCORE_CONFIG;
    return cachedConfig;
  }

  const config = parseBetScoreConfig(fs.readFileSync(resolvedPath, 'utf-8'));

  if (!explicitPath) {
    cachedConfig = config;
  }

  return config;
}

/**
 * Clear the cached configuration (useful for testing)
 */
export function clearBetScoreConfigCache(): void {
  cachedConfig = null;
}
