#!/usr/bin/env node

/**
 * Slate Analyzer CLI
 *
 * Command: npm run analyze:slate -- --date 2025-10-12 [--adapter file] [--input games.json] [--out ./out]
 *
 * Loads a batch of games, scores moneyline and spread edges, prints the top
 * rows, and writes moneyline-<date>.csv and spread-<date>.csv.
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { analyzeGames } from '../web/lib/analysis/analyze-games';
import type { GameAnalysis } from '../web/lib/analysis/types';
import { loadBetScoreConfig } from '../web/lib/config/betscore-config';
import { tablesToCsv } from '../web/lib/csv-export';
import type { GameInput } from '../web/lib/schemas/game-input';
import { AdapterFactory } from './adapters/AdapterFactory';
import { GameFileError, readGamesFile } from './adapters/FileGameSource';

dotenv.config();

export interface AnalyzeSlateOptions {
  date: string;
  adapter?: string;
  input?: string;
  out: string;
  config?: string;
  top: number;
  datasources?: string;
}

const errMsg = (e: unknown): string => (e instanceof Error ? e.message : String(e));

/**
 * --top parser: a positive whole number
 */
export function parseTopOption(value: string): number {
  const top = Number(value);
  if (!Number.isInteger(top) || top < 1) {
    throw new InvalidArgumentError(`Expected a positive whole number, got "${value}".`);
  }
  return top;
}

/**
 * Console lines for a failed run; file errors also name the file
 */
export function describeError(error: unknown): string[] {
  const lines = [`❌ Error analyzing slate: ${errMsg(error)}`];
  if (error instanceof GameFileError) {
    lines.push(`   File: ${error.filePath}`);
  }
  return lines;
}

function formatNullable(value: number | null, digits: number = 3): string {
  return value === null ? '—' : value.toFixed(digits);
}

/**
 * Load games from --input when given, otherwise from the configured adapter
 */
export async function loadGames(options: AnalyzeSlateOptions): Promise<GameInput[]> {
  if (options.input) {
    return readGamesFile(path.resolve(options.input));
  }

  const factory = new AdapterFactory(options.datasources);
  const adapter = factory.createAdapter(options.adapter);

  if (!(await adapter.isAvailable())) {
    throw new Error(`Adapter '${adapter.getName()}' is not available`);
  }

  console.log(`📡 Loading games via ${adapter.getName()} for ${options.date}`);
  return adapter.getGames(options.date);
}

/**
 * Write both CSV reports; returns the written paths
 */
export function writeReports(analysis: GameAnalysis, outDir: string, date: string): { moneyline: string; spread: string } {
  fs.mkdirSync(outDir, { recursive: true });

  const csv = tablesToCsv(analysis.moneyline, analysis.spread);
  const moneylinePath = path.join(outDir, `moneyline-${date}.csv`);
  const spreadPath = path.join(outDir, `spread-${date}.csv`);

  fs.writeFileSync(moneylinePath, csv.moneyline, 'utf-8');
  fs.writeFileSync(spreadPath, csv.spread, 'utf-8');

  return { moneyline: moneylinePath, spread: spreadPath };
}

/**
 * Human-readable summary of the top N rows of each table
 */
export function summarize(analysis: GameAnalysis, top: number): string[] {
  const lines: string[] = [];

  lines.push(`\n💰 Moneyline (top ${Math.min(top, analysis.moneyline.length)})`);
  for (const row of analysis.moneyline.slice(0, top)) {
    lines.push(
      `   ${row.away} @ ${row.home}: BetScore ${row.BetScore_ML_home.toFixed(3)} ` +
      `(model ${formatNullable(row.model_home_win_prob)}, implied ${formatNullable(row.implied_home_ml_prob)})`
    );
  }

  lines.push(`\n📏 Spread (top ${Math.min(top, analysis.spread.length)})`);
  for (const row of analysis.spread.slice(0, top)) {
    lines.push(
      `   ${row.away} @ ${row.home} ${formatNullable(row.spread_home, 1)}: BetScore ${row.BetScore_ATS_home.toFixed(3)} ` +
      `(cover ${formatNullable(row.model_home_cover)}, implied ${formatNullable(row.imp_home_cover)})`
    );
  }

  if (analysis.skipped.length > 0) {
    lines.push(`\n⚠️  Skipped ${analysis.skipped.length} game(s):`);
    for (const skipped of analysis.skipped) {
      lines.push(`   ${skipped.game_id}: ${skipped.error}`);
    }
  }

  return lines;
}

export async function runAnalyzeSlate(options: AnalyzeSlateOptions): Promise<GameAnalysis> {
  const config = loadBetScoreConfig(options.config);
  const games = await loadGames(options);

  const analysis = analyzeGames(games, { config });
  for (const line of summarize(analysis, options.top)) {
    console.log(line);
  }

  const written = writeReports(analysis, options.out, options.date);
  console.log(`\n✅ Wrote ${written.moneyline}`);
  console.log(`✅ Wrote ${written.spread}`);

  return analysis;
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Main entry point
 */
async function main() {
  const program = new Command();

  program
    .name('analyze-slate')
    .description('Score moneyline and spread edges for a slate of games')
    .option('--date <yyyy-mm-dd>', 'Slate date', today())
    .option('--adapter <name>', 'Game source adapter from datasources.yml')
    .option('--input <path>', 'Read games from this JSON file instead of an adapter')
    .option('--out <dir>', 'Output directory for CSV reports', process.env.REPORTS_DIR || './out')
    .option('--config <path>', 'BetScore weights YAML')
    .option('--datasources <path>', 'datasources.yml location')
    .option('--top <n>', 'Rows to print per table', parseTopOption, 10)
    .action(async (opts: AnalyzeSlateOptions) => {
      try {
        await runAnalyzeSlate(opts);
      } catch (error) {
        for (const line of describeError(error)) {
          console.error(line);
        }
        process.exit(1);
      }
    });

  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch(error => {
    console.error('❌ Fatal:', errMsg(error));
    process.exit(1);
  });
}
