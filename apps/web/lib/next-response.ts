/**
 * Convert a service response into a NextResponse
 */

import { NextResponse } from 'next/server';
import type { ServiceResponse } from './analyze-service';

export function toNextResponse(result: ServiceResponse, filename?: string): NextResponse {
  if (result.kind === 'csv') {
    const headers: Record<string, string> = { 'Content-Type': 'text/csv; charset=utf-8' };
    if (filename) {
      headers['Content-Disposition'] = `attachment; filename="${filename}"`;
    }
    return new NextResponse(result.body, { status: result.status, headers });
  }

  return NextResponse.json(result.body, { status: result.status });
}
