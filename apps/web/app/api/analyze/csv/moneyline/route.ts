/**
 * Moneyline report as CSV text
 */

import { NextRequest } from 'next/server';
import { handleAnalyze } from '@/lib/analyze-service';
import { toNextResponse } from '@/lib/next-response';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

export async function POST(request: NextRequest) {
  const result = await handleAnalyze(() => request.json(), 'csv-moneyline');
  return toNextResponse(result, 'moneyline.csv');
}
