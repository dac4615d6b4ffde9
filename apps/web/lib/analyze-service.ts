/**
 * Analyze Service
 *
 * Request handling shared by the /api/analyze routes: validate the payload,
 * run the analysis, and shape the JSON or CSV response. Kept free of Next.js
 * types so it can be exercised directly.
 */

import { analyzeGames } from './analysis/analyze-games';
import type { MoneylineRow, SkippedGame, SpreadRow } from './analysis/types';
import { BetScoreConfig, loadBetScoreConfig } from './config/betscore-config';
import { tablesToCsv } from './csv-export';
import { createLogger } from './logger';
import { FieldIssue, parseBatch } from './schemas/game-input';

const log = createLogger('analyze-service');

export type AnalyzeFormat = 'json' | 'csv-moneyline' | 'csv-spread';

export class AnalyzePayloadError extends Error {
  constructor(public readonly issues: FieldIssue[]) {
    super(`Validation failed (${issues.length} issue${issues.length === 1 ? '' : 's'})`);
    this.name = 'AnalyzePayloadError';
  }
}

export interface AnalyzeResult {
  moneyline_table: MoneylineRow[];
  spread_table: SpreadRow[];
  skipped: SkippedGame[];
  csv: {
    moneyline: string;
    spread: string;
  };
}

export interface AnalyzeSuccessBody extends AnalyzeResult {
  success: true;
}

export interface ErrorBody {
  success: false;
  error: string;
  detail?: FieldIssue[];
}

export type ServiceResponse =
  | { kind: 'json'; status: number; body: AnalyzeSuccessBody | ErrorBody }
  | { kind: 'csv'; status: number; body: string };

export interface AnalyzeServiceOptions {
  config?: BetScoreConfig;
}

/**
 * Validate and analyze a raw payload ({ games: [...] }).
 * Throws AnalyzePayloadError when the payload does not match the schema.
 */
export function runAnalysis(payload: unknown, options: AnalyzeServiceOptions = {}): AnalyzeResult {
  const parsed = parseBatch(payload);
  if (!parsed.success) {
    throw new AnalyzePayloadError(parsed.issues);
  }

  const config = options.config ?? loadBetScoreConfig();
  const { moneyline, spread, skipped } = analyzeGames(parsed.games, { config });

  return {
    moneyline_table: moneyline,
    spread_table: spread,
    skipped,
    csv: tablesToCsv(moneyline, spread),
  };
}

function validationFailed(issues: FieldIssue[]): ServiceResponse {
  return {
    kind: 'json',
    status: 422,
    body: { success: false, error: 'Validation failed', detail: issues },
  };
}

/**
 * Handle one analyze request. readBody is the request's JSON reader.
 */
export async function handleAnalyze(
  readBody: () => Promise<unknown>,
  format: AnalyzeFormat,
  options: AnalyzeServiceOptions = {}
): Promise<ServiceResponse> {
  let payload: unknown;
  try {
    payload = await readBody();
  } catch (error) {
    log.warn('Request body is not valid JSON', error);
    return validationFailed([{ loc: ['body'], msg: 'Request body must be valid JSON', type: 'invalid_json' }]);
  }

  try {
    const result = runAnalysis(payload, options);

    switch (format) {
      case 'csv-moneyline':
        return { kind: 'csv', status: 200, body: result.csv.moneyline };
      case 'csv-spread':
        return { kind: 'csv', status: 200, body: result.csv.spread };
      default:
        return { kind: 'json', status: 200, body: { success: true, ...result } };
    }
  } catch (error) {
    if (error instanceof AnalyzePayloadError) {
      return validationFailed(error.issues);
    }

    log.error('ANALYZE_API_ERROR', error);
    return {
      kind: 'json',
      status: 500,
      body: { success: false, error: `analysis error: ${error instanceof Error ? error.message : String(error)}` },
    };
  }
}
