/**
 * Service descriptor
 */

import { NextResponse } from 'next/server';

export const dynamic = 'force-dynamic';

const SERVICE_ENDPOINTS = {
  analyze: 'POST /api/analyze  -> JSON tables + CSV text',
  analyze_csv_moneyline: 'POST /api/analyze/csv/moneyline  -> CSV text',
  analyze_csv_spread: 'POST /api/analyze/csv/spread  -> CSV text',
  health: 'GET /api/health',
};

export async function GET() {
  return NextResponse.json({
    service: 'slate-edge-analyzer',
    status: 'ok',
    endpoints: SERVICE_ENDPOINTS,
  });
}
