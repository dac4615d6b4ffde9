/**
 * Analyze API
 *
 * POST { games: GameInput[] }
 * Returns moneyline_table, spread_table, skipped games, and both CSV renderings.
 */

import { NextRequest } from 'next/server';
import { handleAnalyze } from '@/lib/analyze-service';
import { toNextResponse } from '@/lib/next-response';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  const result = await handleAnalyze(() => request.json(), 'json');
  return toNextResponse(result);
}
