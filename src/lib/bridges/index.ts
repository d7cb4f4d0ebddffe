/**
 * Bridge Flood Forecast Engine
 *
 * Flow forecast -> depth profile -> risk levels -> cross-section render model.
 *
 * Only the record lookup is async; profiling, classification and assembly
 * are synchronous and pure, and each request is computed independently.
 */

import type { BridgeForecastResult, ForecastRequest } from '@/types/bridge';
import { unknownBridge } from './errors';
import { profileForecast } from './depth-profile';
import { assembleCrossSection } from './cross-section';
import type { BridgeRecordProvider } from './provider';

export interface RunForecastOptions {
  provider: Pick<BridgeRecordProvider, 'get'>;
  warningMarginFt?: number;
  siteTimeZone?: string;
}

export async function runBridgeForecast(
  request: ForecastRequest,
  options: RunForecastOptions
): Promise<BridgeForecastResult> {
  const record = await options.provider.get(request.bridgeId);
  if (!record) {
    throw unknownBridge(request.bridgeId);
  }

  const profile = profileForecast(record, request, { warningMarginFt: options.warningMarginFt });
  const crossSection = assembleCrossSection(record, profile, { siteTimeZone: options.siteTimeZone });

  return { profile, crossSection };
}

export * from './errors';
export { depthFor, assertRatingCurve } from './rating-curve';
export { profileForecast, FORECAST_STEP_HOURS } from './depth-profile';
export { classifyRisk, maxRiskLevel, compareRiskLevels, DEFAULT_WARNING_MARGIN_FT } from './risk';
export { assembleCrossSection } from './cross-section';
export { parseBridgeRecord } from './record-schema';
export { BridgeRecordProvider, type BridgeRecordSource } from './provider';
export { SupabaseStorageBridgeSource } from './storage-source';
export { parseForecastQuery } from './forecast-query';
