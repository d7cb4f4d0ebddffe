/**
 * Rating Curve Interpolation
 * ==========================
 *
 * Maps a stream flow to a water depth using a bridge's synthetic rating
 * curve (flow -> depth sample table).
 *
 * RANGE POLICY (asymmetric on purpose):
 * - Below the first sample: clamp to the first sample's depth. Sub-threshold
 *   flows produce the minimum characterized depth.
 * - Above the last sample: extrapolate with the slope of the last two
 *   samples. Forecast flows past the calibrated range must still raise the
 *   water surface, otherwise risk is understated.
 */

import type { RatingCurve } from '@/types/bridge';
import { BridgeForecastError, invalidCurve } from './errors';

/**
 * Checks the shape depthFor needs: at least two samples, flow strictly
 * ascending, every value finite.
 */
function assertInterpolable(curve: RatingCurve): void {
  if (curve.length < 2) {
    throw invalidCurve(`Rating curve needs at least 2 samples, got ${curve.length}`);
  }

  for (let i = 0; i < curve.length; i++) {
    const { flow, depth } = curve[i];
    if (!Number.isFinite(flow) || !Number.isFinite(depth)) {
      throw invalidCurve(`Rating curve sample ${i} is not a finite number`);
    }
    if (i > 0 && flow <= curve[i - 1].flow) {
      throw invalidCurve(
        `Rating curve flow must be strictly ascending (sample ${i}: ${flow} after ${curve[i - 1].flow})`
      );
    }
  }
}

/**
 * Full validation applied when a bridge record is loaded.
 * Adds the physical constraints on top of assertInterpolable.
 */
export function assertRatingCurve(curve: RatingCurve): void {
  assertInterpolable(curve);

  for (let i = 0; i < curve.length; i++) {
    const { flow, depth } = curve[i];
    if (flow < 0 || depth < 0) {
      throw invalidCurve(`Rating curve sample ${i} is negative (${flow}, ${depth})`);
    }
    if (i > 0 && depth < curve[i - 1].depth) {
      throw invalidCurve(
        `Rating curve depth must not decrease (sample ${i}: ${depth} after ${curve[i - 1].depth})`
      );
    }
  }
}

/**
 * Index of the last sample whose flow is <= the given flow.
 * Caller guarantees curve[0].flow <= flow < curve[last].flow.
 */
function findSegment(curve: RatingCurve, flow: number): number {
  let lo = 0;
  let hi = curve.length - 1;

  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (curve[mid].flow <= flow) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  return lo;
}

/**
 * Depth (ft) for a flow (cfs).
 *
 * @throws BridgeForecastError INVALID_CURVE for a degenerate table,
 *   INVALID_FORECAST for a non-finite flow
 */
export function depthFor(curve: RatingCurve, flow: number): number {
  assertInterpolable(curve);

  if (!Number.isFinite(flow)) {
    throw new BridgeForecastError(`Flow must be a finite number, got ${flow}`, 'INVALID_FORECAST');
  }

  const first = curve[0];
  if (flow <= first.flow) {
    return first.depth;
  }

  const last = curve[curve.length - 1];
  if (flow === last.flow) {
    return last.depth;
  }

  if (flow > last.flow) {
    const prev = curve[curve.length - 2];
    const slope = (last.depth - prev.depth) / (last.flow - prev.flow);
    return last.depth + slope * (flow - last.flow);
  }

  const i = findSegment(curve, flow);
  const a = curve[i];
  if (flow === a.flow) {
    return a.depth;
  }

  const b = curve[i + 1];
  const t = (flow - a.flow) / (b.flow - a.flow);
  return a.depth + t * (b.depth - a.depth);
}
