export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

import { NextResponse } from 'next/server';
import { checkHealth, type HealthReport } from '@/lib/bridges/health';

export async function GET(): Promise<NextResponse<HealthReport>> {
  return NextResponse.json(checkHealth(), {
    status: 200,
    headers: {
      'Cache-Control': 'no-store',
    },
  });
}
