/**
 * Game Analysis
 *
 * Turns a validated batch of games into the moneyline and spread edge tables.
 * Games are independent: each runs inside its own failure boundary, and a game
 * that throws is reported in `skipped` instead of failing the batch.
 */

import type { GameInput } from '../schemas/game-input';
import { BetScoreConfig, DEFAULT_BETSCORE_CONFIG } from '../config/betscore-config';
import { createLogger } from '../logger';
import { americanToProbability, modelCoverProbability, modelWinProbability } from './probability';
import { findLine, injurySum, splitPct, sumExperts } from './extractors';
import {
  computeBetScoreATS,
  computeBetScoreML,
  computeEdge,
  roundOrNull,
  sharpDelta,
} from './betscore';
import type { GameAnalysis, MoneylineRow, SkippedGame, SpreadRow } from './types';

const log = createLogger('analyze-games');

export interface AnalyzeOptions {
  config?: BetScoreConfig;
}

export interface GameRows {
  moneyline: MoneylineRow;
  spread: SpreadRow;
}

/**
 * Analyze a single game (both markets)
 */
export function analyzeGame(game: GameInput, config: BetScoreConfig = DEFAULT_BETSCORE_CONFIG): GameRows {
  // --- projections ---
  const projHome = game.projection.proj_home_pts ?? null;
  const projAway = game.projection.proj_away_pts ?? null;
  const projTotal = game.projection.proj_total ?? null;

  // --- lines ---
  const mlHomeLine = findLine(game.market_lines, 'moneyline', 'home');
  const mlAwayLine = findLine(game.market_lines, 'moneyline', 'away');
  const spreadHomeLine = findLine(game.market_lines, 'spread', 'home');
  const spreadAwayLine = findLine(game.market_lines, 'spread', 'away');

  // Moneyline odds are quoted in current_line; spread odds in current_price
  const impliedHomeMl = americanToProbability(mlHomeLine?.current_line);
  const spreadHome = spreadHomeLine?.current_line ?? null;
  const spreadHomePrice = spreadHomeLine?.current_price ?? null;
  const impliedHomeCover = americanToProbability(spreadHomePrice);

  log.debug(`${game.game_id} away side`, {
    impliedAwayMl: americanToProbability(mlAwayLine?.current_line),
    impliedAwayCover: americanToProbability(spreadAwayLine?.current_price),
  });

  // --- model probabilities ---
  const { sigma } = config;
  const modelHomeWin = modelWinProbability(projHome, projAway, projTotal, sigma);
  const modelHomeCover = modelCoverProbability(projHome, projAway, spreadHome, projTotal, sigma);

  // --- edges ---
  const edgeHomeMl = computeEdge(modelHomeWin, impliedHomeMl);
  const edgeHomeCover = computeEdge(modelHomeCover, impliedHomeCover);

  // --- splits & experts ---
  const publicHomeMl = splitPct(game.splits, 'moneyline', 'home', 'public_pct');
  const moneyHomeMl = splitPct(game.splits, 'moneyline', 'home', 'money_pct');
  const publicHomeSpread = splitPct(game.splits, 'spread', 'home', 'public_pct');
  const moneyHomeSpread = splitPct(game.splits, 'spread', 'home', 'money_pct');

  const expertsMlHome = sumExperts(game.experts, 'moneyline', 'home');
  const expertsMlAway = sumExperts(game.experts, 'moneyline', 'away');
  const expertsSpreadHome = sumExperts(game.experts, 'spread', 'home');
  const expertsSpreadAway = sumExperts(game.experts, 'spread', 'away');

  const sharpDeltaMl = sharpDelta(moneyHomeMl, publicHomeMl);
  const sharpDeltaSpread = sharpDelta(moneyHomeSpread, publicHomeSpread);

  // --- injuries ---
  const injHome = injurySum(game.injuries, game.home_team);
  const injAway = injurySum(game.injuries, game.away_team);

  // --- BetScores ---
  const betScoreMl = computeBetScoreML(
    {
      edge: edgeHomeMl,
      expertsHome: expertsMlHome,
      expertsAway: expertsMlAway,
      sharpDeltaHome: sharpDeltaMl,
      injuryHome: injHome,
      injuryAway: injAway,
    },
    config
  );
  const betScoreAts = computeBetScoreATS(
    {
      edge: edgeHomeCover,
      expertsHome: expertsSpreadHome,
      expertsAway: expertsSpreadAway,
      sharpDeltaHome: sharpDeltaSpread,
      injuryHome: injHome,
      injuryAway: injAway,
    },
    config
  );

  const identity = {
    game_id: game.game_id,
    league: game.league,
    date: game.date,
    away: game.away_team,
    home: game.home_team,
  };

  return {
    moneyline: {
      ...identity,
      model_home_win_prob: roundOrNull(modelHomeWin),
      implied_home_ml_prob: roundOrNull(impliedHomeMl),
      edge_home_ml_prob: roundOrNull(edgeHomeMl),
      experts_moneyline_home: expertsMlHome,
      experts_moneyline_away: expertsMlAway,
      public_home_ml_pct: roundOrNull(publicHomeMl),
      money_home_ml_pct: roundOrNull(moneyHomeMl),
      inj_home_total: roundOrNull(injHome),
      inj_away_total: roundOrNull(injAway),
      BetScore_ML_home: betScoreMl,
    },
    spread: {
      ...identity,
      spread_home: roundOrNull(spreadHome),
      spread_home_price: roundOrNull(spreadHomePrice),
      model_home_cover: roundOrNull(modelHomeCover),
      imp_home_cover: roundOrNull(impliedHomeCover),
      experts_spread_home: expertsSpreadHome,
      experts_spread_away: expertsSpreadAway,
      public_home_spread_pct: roundOrNull(publicHomeSpread),
      money_home_spread_pct: roundOrNull(moneyHomeSpread),
      inj_home_total: roundOrNull(injHome),
      inj_away_total: roundOrNull(injAway),
      BetScore_ATS_home: betScoreAts,
    },
  };
}

function errMsg(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Analyze every game, then sort both tables by BetScore descending.
 * Array.prototype.sort is stable, so tied scores keep input order.
 */
export function analyzeGames(games: readonly GameInput[], options: AnalyzeOptions = {}): GameAnalysis {
  const config = options.config ?? DEFAULT_BETSCORE_CONFIG;

  const moneyline: MoneylineRow[] = [];
  const spread: SpreadRow[] = [];
  const skipped: SkippedGame[] = [];

  for (const game of games) {
    try {
      const rows = analyzeGame(game, config);
      moneyline.push(rows.moneyline);
      spread.push(rows.spread);
    } catch (error) {
      log.warn(`Skipping game ${game.game_id}: ${errMsg(error)}`);
      skipped.push({ game_id: String(game.game_id), error: errMsg(error) });
    }
  }

  moneyline.sort((a, b) => b.BetScore_ML_home - a.BetScore_ML_home);
  spread.sort((a, b) => b.BetScore_ATS_home - a.BetScore_ATS_home);

  log.info(`Analyzed ${moneyline.length} of ${games.length} games (${skipped.length} skipped)`);

  return { moneyline, spread, skipped };
}
