/**
 * Cross-Section Request Handling
 *
 * Framework-free core of GET /xs/: query -> forecast -> JSON body + status.
 *
 * Response Contract:
 * - ALL exit paths return { success: boolean, ... }
 * - Errors carry the engine code and, where one exists, the legacy code
 * - Internal error details are logged, not returned
 */

import type { CrossSectionRenderModel } from '@/types/bridge';
import type { BridgeEngineConfig } from '@/lib/config/bridges';
import { isBridgeForecastError, type BridgeForecastErrorCode } from './errors';
import { parseForecastQuery } from './forecast-query';
import type { BridgeRecordProvider } from './provider';
import { runBridgeForecast } from './index';

export interface CrossSectionResponse {
  success: boolean;
  crossSection: CrossSectionRenderModel | null;
  error?: string;
  errorCode?: BridgeForecastErrorCode | 'INTERNAL';
  legacyCode?: string;
}

export interface HandlerResult {
  status: number;
  body: CrossSectionResponse;
}

export interface HandlerEngine {
  config: Pick<BridgeEngineConfig, 'warningMarginFt' | 'expectedSteps' | 'siteTimeZone'>;
  provider: Pick<BridgeRecordProvider, 'get'>;
}

const STATUS_BY_CODE: Record<BridgeForecastErrorCode, number> = {
  EMPTY_FORECAST: 400,
  INVALID_FORECAST: 400,
  UNKNOWN_BRIDGE: 404,
  INVALID_CURVE: 422,
  INVALID_RECORD: 422,
  PROVIDER_UNAVAILABLE: 503,
};

export async function handleCrossSectionRequest(url: string | URL, engine: HandlerEngine): Promise<HandlerResult> {
  const { searchParams } = new URL(url);

  try {
    const request = parseForecastQuery(searchParams, { expectedSteps: engine.config.expectedSteps });
    const { crossSection } = await runBridgeForecast(request, {
      provider: engine.provider,
      warningMarginFt: engine.config.warningMarginFt,
      siteTimeZone: engine.config.siteTimeZone,
    });

    console.log(
      `[XS_API] ${request.bridgeId}: ${crossSection.frames.length} steps, overall ${crossSection.overallRisk}`
    );
    return { status: 200, body: { success: true, crossSection } };
  } catch (error) {
    if (isBridgeForecastError(error)) {
      const status = STATUS_BY_CODE[error.code];
      const log = status >= 500 || error.code === 'INVALID_CURVE' || error.code === 'INVALID_RECORD'
        ? console.error
        : console.warn;
      log(`[XS_API] ${error.code}${error.legacyCode ? ` (${error.legacyCode})` : ''}: ${error.message}`);

      return {
        status,
        body: {
          success: false,
          crossSection: null,
          error: error.message,
          errorCode: error.code,
          legacyCode: error.legacyCode,
        },
      };
    }

    console.error('[XS_API] Unexpected error:', error);
    return {
      status: 500,
      body: {
        success: false,
        crossSection: null,
        error: 'Internal error',
        errorCode: 'INTERNAL',
      },
    };
  }
}
