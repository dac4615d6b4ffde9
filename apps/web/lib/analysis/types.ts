/**
 * Analysis output rows. Home-team perspective, one row per game per market.
 * null means unknown (missing projection, line, or split).
 */

export interface GameIdentity {
  readonly game_id: string;
  readonly league: string;
  readonly date: string;
  readonly away: string;
  readonly home: string;
}

export interface MoneylineRow extends GameIdentity {
  readonly model_home_win_prob: number | null;
  readonly implied_home_ml_prob: number | null;
  readonly edge_home_ml_prob: number | null;
  readonly experts_moneyline_home: number;
  readonly experts_moneyline_away: number;
  readonly public_home_ml_pct: number | null;
  readonly money_home_ml_pct: number | null;
  readonly inj_home_total: number | null;
  readonly inj_away_total: number | null;
  readonly BetScore_ML_home: number;
}

export interface SpreadRow extends GameIdentity {
  readonly spread_home: number | null;
  readonly spread_home_price: number | null;
  readonly model_home_cover: number | null;
  readonly imp_home_cover: number | null;
  readonly experts_spread_home: number;
  readonly experts_spread_away: number;
  readonly public_home_spread_pct: number | null;
  readonly money_home_spread_pct: number | null;
  readonly inj_home_total: number | null;
  readonly inj_away_total: number | null;
  readonly BetScore_ATS_home: number;
}

export interface SkippedGame {
  readonly game_id: string;
  readonly error: string;
}

export interface GameAnalysis {
  moneyline: MoneylineRow[];
  spread: SpreadRow[];
  skipped: SkippedGame[];
}
