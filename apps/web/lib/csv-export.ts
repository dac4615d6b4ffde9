/**
 * CSV Export Utility
 *
 * Renders the analysis tables as CSV text with a fixed column order per table.
 */

import type { MoneylineRow, SpreadRow } from './analysis/types';

export const MONEYLINE_COLUMNS = [
  'game_id', 'league', 'date', 'away', 'home',
  'model_home_win_prob', 'implied_home_ml_prob', 'edge_home_ml_prob',
  'experts_moneyline_home', 'experts_moneyline_away',
  'public_home_ml_pct', 'money_home_ml_pct',
  'inj_home_total', 'inj_away_total',
  'BetScore_ML_home',
] as const satisfies readonly (keyof MoneylineRow)[];

export const SPREAD_COLUMNS = [
  'game_id', 'league', 'date', 'away', 'home',
  'spread_home', 'spread_home_price',
  'model_home_cover', 'imp_home_cover',
  'experts_spread_home', 'experts_spread_away',
  'public_home_spread_pct', 'money_home_spread_pct',
  'inj_home_total', 'inj_away_total',
  'BetScore_ATS_home',
] as const satisfies readonly (keyof SpreadRow)[];

const LINE_END = '\r\n';

/**
 * Escape a CSV field value (handles commas, quotes, and newlines)
 */
export function escapeCsvField(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  const stringValue = String(value);

  // If the value contains comma, quote, or newline, wrap it in quotes and escape internal quotes
  if (/[",\r\n]/.test(stringValue)) {
    return `"${stringValue.replace(/"/g, '""')}"`;
  }

  return stringValue;
}

/**
 * Convert rows to CSV using the given column order.
 * Empty input gives '' (no header). Extra row fields are ignored; missing ones render empty.
 */
export function rowsToCsv<T extends object>(rows: readonly T[], columns: readonly string[]): string {
  if (rows.length === 0) {
    return '';
  }

  const lines = [
    columns.map(escapeCsvField).join(','),
    ...rows.map(row => {
      const record = new Map<string, unknown>(Object.entries(row));
      return columns.map(column => escapeCsvField(record.get(column))).join(',');
    }),
  ];

  return lines.map(line => line + LINE_END).join('');
}

export function moneylineToCsv(rows: readonly MoneylineRow[]): string {
  return rowsToCsv(rows, MONEYLINE_COLUMNS);
}

export function spreadToCsv(rows: readonly SpreadRow[]): string {
  return rowsToCsv(rows, SPREAD_COLUMNS);
}

export function tablesToCsv(
  moneyline: readonly MoneylineRow[],
  spread: readonly SpreadRow[]
): { moneyline: string; spread: string } {
  return {
    moneyline: moneylineToCsv(moneyline),
    spread: spreadToCsv(spread),
  };
}
