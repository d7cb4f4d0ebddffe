/**
 * Bridge Cross-Section Forecast Endpoint
 *
 * GET /xs/?uuid=<bridge>&list_flows=10,20,...,180&first_utc_time=2024-02-04T19:00:00
 *
 * Returns the cross-section render model for an 18-hour short-range flow
 * forecast: section geometry, structure reference lines, and one classified
 * water surface per forecast hour.
 *
 * RUNTIME:
 * Must run in Node.js runtime (not Edge) for the service role key and the
 * process-wide bridge record cache.
 */

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

import { NextRequest, NextResponse } from 'next/server';
import { getSharedBridgeEngine, type BridgeEngine } from '@/lib/bridges/shared-provider';
import { handleCrossSectionRequest, type CrossSectionResponse } from '@/lib/bridges/xs-handler';

export async function GET(request: NextRequest): Promise<NextResponse<CrossSectionResponse>> {
  let engine: BridgeEngine;
  try {
    engine = getSharedBridgeEngine();
  } catch (error) {
    // Deployment misconfiguration: missing storage credentials or invalid env
    console.error('[XS_API] Bridge engine unavailable:', error);
    return NextResponse.json(
      {
        success: false,
        crossSection: null,
        error: 'Bridge data not available',
        errorCode: 'PROVIDER_UNAVAILABLE',
      },
      { status: 503 }
    );
  }

  const { status, body } = await handleCrossSectionRequest(request.url, engine);
  return NextResponse.json(body, {
    status,
    headers: {
      'Cache-Control': 'no-store',
    },
  });
}
