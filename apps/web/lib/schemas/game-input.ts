/**
 * Game Input Schemas
 *
 * Zod schemas for the analysis batch payload: { games: GameInput[] }.
 * Market and option strings are case-insensitive and normalised to lower case.
 */

import { z } from 'zod';

export const MARKETS = ['moneyline', 'spread', 'total'] as const;
export const EXPERT_MARKETS = ['moneyline', 'spread'] as const;
export const SIDES = ['home', 'away'] as const;
export const TOTAL_SIDES = ['over', 'under'] as const;

export type Market = (typeof MARKETS)[number];
export type ExpertMarket = (typeof EXPERT_MARKETS)[number];
export type Side = (typeof SIDES)[number];
export type TotalSide = (typeof TOTAL_SIDES)[number];
export type MarketOption = Side | TotalSide;

const lowercase = z.string().transform(v => v.toLowerCase());

// Numeric strings ("-110", " 24 ") are read as numbers; anything else is left for z.number() to reject
function fromNumericString(value: unknown): unknown {
  if (typeof value !== 'string' || value.trim() === '') return value;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : value;
}

const numeric = z.preprocess(fromNumericString, z.number());
const integer = z.preprocess(fromNumericString, z.number().int());
const optionalNumber = numeric.nullish();
const optionalString = z.string().nullish();

const marketField = lowercase.pipe(
  z.enum(MARKETS, { errorMap: () => ({ message: 'market must be moneyline|spread|total' }) })
);

/**
 * Option domain depends on the market: home|away for moneyline/spread, over|under for total
 */
function checkOption(item: { market: Market; option: string }, ctx: z.RefinementCtx): void {
  if (item.market === 'total') {
    if (!(TOTAL_SIDES as readonly string[]).includes(item.option)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['option'],
        message: 'option must be over|under for total',
      });
    }
    return;
  }
  if (!(SIDES as readonly string[]).includes(item.option)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['option'],
      message: 'option must be home|away for moneyline/spread',
    });
  }
}

function isMarketOption(value: string): value is MarketOption {
  return (SIDES as readonly string[]).includes(value) || (TOTAL_SIDES as readonly string[]).includes(value);
}

const optionField = lowercase.refine(isMarketOption, {
  message: 'option must be home|away|over|under',
});

export const ProjectionSchema = z.object({
  proj_home_pts: numeric,
  proj_away_pts: numeric,
  proj_total: optionalNumber,
  proj_spread_home: optionalNumber,
  proj_spread_away: optionalNumber,
  grade: optionalString,
});

export const LineItemSchema = z
  .object({
    market: marketField,
    option: optionField,
    open_line: optionalNumber,
    open_price: optionalNumber,
    // ML: American odds. Spread/total: the number (e.g. -3.5 / 46.5)
    current_line: optionalNumber,
    // Spread/total price (e.g. -110)
    current_price: optionalNumber,
    book: optionalString,
  })
  .superRefine(checkOption);

export const SplitItemSchema = z
  .object({
    market: marketField,
    option: optionField,
    public_pct: optionalNumber,
    money_pct: optionalNumber,
  })
  .superRefine(checkOption);

export const ExpertItemSchema = z.object({
  market: lowercase.pipe(
    z.enum(EXPERT_MARKETS, { errorMap: () => ({ message: 'expert.market must be moneyline|spread' }) })
  ),
  option: lowercase.pipe(
    z.enum(SIDES, { errorMap: () => ({ message: 'expert.option must be home|away' }) })
  ),
  count: integer.default(0),
  source: optionalString,
});

export const InjuryItemSchema = z.object({
  team: z.string(),
  player: optionalString,
  pos: optionalString,
  status: optionalString,
  impact_0to1: numeric.nullish().default(0),
  note: optionalString,
});

export const GameInputSchema = z.object({
  game_id: z.string(),
  league: z.string(),
  date: z.string(),
  start_time_local: optionalString,
  home_team: z.string(),
  away_team: z.string(),
  projection: ProjectionSchema,
  market_lines: z.array(LineItemSchema).default([]),
  splits: z.array(SplitItemSchema).default([]),
  experts: z.array(ExpertItemSchema).default([]),
  injuries: z.array(InjuryItemSchema).default([]),
});

export const BatchGamesSchema = z.object({
  games: z.array(GameInputSchema),
});

export type Projection = z.infer<typeof ProjectionSchema>;
export type LineItem = z.infer<typeof LineItemSchema>;
export type SplitItem = z.infer<typeof SplitItemSchema>;
export type ExpertItem = z.infer<typeof ExpertItemSchema>;
export type InjuryItem = z.infer<typeof InjuryItemSchema>;
export type GameInput = z.infer<typeof GameInputSchema>;
export type BatchGames = z.infer<typeof BatchGamesSchema>;

/**
 * Field-level validation detail, one entry per failing field
 */
export interface FieldIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

export type ParseBatchResult =
  | { success: true; games: GameInput[] }
  | { success: false; issues: FieldIssue[] };

export function toFieldIssues(error: z.ZodError): FieldIssue[] {
  return error.issues.map(issue => ({
    loc: issue.path,
    msg: issue.message,
    type: issue.code,
  }));
}

/**
 * Validate an untrusted payload into a batch of games
 */
export function parseBatch(payload: unknown): ParseBatchResult {
  const result = BatchGamesSchema.safeParse(payload);

  if (!result.success) {
    return { success: false, issues: toFieldIssues(result.error) };
  }

  return { success: true, games: result.data.games };
}
