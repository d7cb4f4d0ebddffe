/**
 * Forecast Depth Profile
 *
 * Applies a bridge's rating curve to an hourly flow forecast. Output keeps
 * the input order and length: no resampling, no gap filling.
 */

import { addHours } from 'date-fns';
import type { BridgeRecord, DepthProfile, DepthSample, ForecastRequest } from '@/types/bridge';
import { BridgeForecastError, emptyForecast } from './errors';
import { depthFor } from './rating-curve';
import { classifyRisk, maxRiskLevel, waterSurfaceElevation, DEFAULT_WARNING_MARGIN_FT } from './risk';

/** Each forecast step covers one hour */
export const FORECAST_STEP_HOURS = 1;

export interface ProfileOptions {
  warningMarginFt?: number;
}

export function profileForecast(
  record: BridgeRecord,
  request: ForecastRequest,
  options: ProfileOptions = {}
): DepthProfile {
  if (record.id !== request.bridgeId) {
    throw new BridgeForecastError(
      `Bridge record ${record.id} does not match requested bridge ${request.bridgeId}`,
      'UNKNOWN_BRIDGE',
      false,
      '005'
    );
  }

  if (request.flows.length === 0) {
    throw emptyForecast();
  }

  if (Number.isNaN(request.startTime.getTime())) {
    throw new BridgeForecastError('Forecast start time is not a valid date', 'INVALID_FORECAST', false, '004');
  }

  const warningMarginFt = options.warningMarginFt ?? DEFAULT_WARNING_MARGIN_FT;

  const samples: DepthSample[] = request.flows.map((flow, step) => {
    const depth = depthFor(record.ratingCurve, flow);
    return {
      step,
      timestamp: addHours(request.startTime, step * FORECAST_STEP_HOURS).toISOString(),
      flow,
      depth,
      waterSurfaceElevation: waterSurfaceElevation(depth, record.channelInvertElevation),
      riskLevel: classifyRisk(
        depth,
        record.lowChordElevation,
        record.deckElevation,
        record.channelInvertElevation,
        warningMarginFt
      ),
    };
  });

  return {
    bridgeId: record.id,
    startTime: request.startTime.toISOString(),
    samples,
    overallRisk: maxRiskLevel(samples.map((s) => s.riskLevel)),
  };
}
