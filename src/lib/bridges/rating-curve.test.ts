/**
 * Rating Curve Interpolation Tests
 *
 * Run with: node --import tsx --test src/lib/bridges/rating-curve.test.ts
 */

import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import type { RatingCurve } from '@/types/bridge';
import { isBridgeForecastError, type BridgeForecastErrorCode } from './errors';
import { assertRatingCurve, depthFor } from './rating-curve';

const CURVE: RatingCurve = [
  { flow: 0, depth: 0 },
  { flow: 1000, depth: 2.0 },
  { flow: 5000, depth: 6.5 },
];

function failsWith(code: BridgeForecastErrorCode) {
  return (error: unknown): boolean => isBridgeForecastError(error) && error.code === code;
}

describe('depthFor', () => {
  test('exact sample match returns the sample depth', () => {
    for (const sample of CURVE) {
      assert.equal(depthFor(CURVE, sample.flow), sample.depth);
    }
  });

  test('interior flow interpolates linearly', () => {
    assert.equal(depthFor(CURVE, 500), 1.0);
    assert.equal(depthFor(CURVE, 3000), 4.25);
  });

  test('interior depths stay between the neighbouring samples', () => {
    for (let flow = 1; flow < 5000; flow += 37) {
      const depth = depthFor(CURVE, flow);
      const upper = CURVE.findIndex((s) => s.flow > flow);
      const lo = CURVE[upper - 1];
      const hi = CURVE[upper];
      assert.ok(depth >= lo.depth && depth <= hi.depth, `flow ${flow} gave ${depth}`);
    }
  });

  test('below range clamps to the first depth', () => {
    const curve: RatingCurve = [
      { flow: 100, depth: 0.3 },
      { flow: 200, depth: 0.9 },
    ];
    assert.equal(depthFor(curve, 50), 0.3);
    assert.equal(depthFor(curve, 0), 0.3);
    assert.equal(depthFor(curve, -10), 0.3);
  });

  test('above range extrapolates with the last segment slope', () => {
    const depth = depthFor(CURVE, 8000);
    assert.ok(depth > 6.5);
    assert.ok(Math.abs(depth - 9.875) < 1e-9, `got ${depth}`);
  });

  test('above range on a flat trailing segment stays level', () => {
    const curve: RatingCurve = [
      { flow: 0, depth: 0 },
      { flow: 10, depth: 1 },
      { flow: 20, depth: 1 },
    ];
    assert.equal(depthFor(curve, 30), 1);
  });

  test('two-sample curve works across all ranges', () => {
    const curve: RatingCurve = [
      { flow: 10, depth: 1 },
      { flow: 20, depth: 3 },
    ];
    assert.equal(depthFor(curve, 5), 1);
    assert.equal(depthFor(curve, 15), 2);
    assert.equal(depthFor(curve, 30), 5);
  });

  test('scenario flows give the expected depths', () => {
    const depths = [0, 500, 5000, 8000].map((flow) => depthFor(CURVE, flow));
    assert.deepEqual(depths.slice(0, 3), [0, 1.0, 6.5]);
    assert.ok(depths[3] > 6.5);
  });

  test('fewer than two samples is INVALID_CURVE', () => {
    assert.throws(() => depthFor([], 10), failsWith('INVALID_CURVE'));
    assert.throws(() => depthFor([{ flow: 0, depth: 0 }], 10), failsWith('INVALID_CURVE'));
  });

  test('repeated or descending flow is INVALID_CURVE', () => {
    const repeated: RatingCurve = [
      { flow: 0, depth: 0 },
      { flow: 10, depth: 1 },
      { flow: 10, depth: 2 },
    ];
    const descending: RatingCurve = [
      { flow: 20, depth: 0 },
      { flow: 10, depth: 1 },
    ];
    assert.throws(() => depthFor(repeated, 5), failsWith('INVALID_CURVE'));
    assert.throws(() => depthFor(descending, 5), failsWith('INVALID_CURVE'));
  });

  test('non-finite flow is INVALID_FORECAST', () => {
    assert.throws(() => depthFor(CURVE, Number.NaN), failsWith('INVALID_FORECAST'));
    assert.throws(() => depthFor(CURVE, Number.POSITIVE_INFINITY), failsWith('INVALID_FORECAST'));
  });
});

describe('assertRatingCurve', () => {
  test('accepts a monotonic curve', () => {
    assert.doesNotThrow(() => assertRatingCurve(CURVE));
  });

  test('rejects decreasing depth', () => {
    const curve: RatingCurve = [
      { flow: 0, depth: 1 },
      { flow: 10, depth: 0.5 },
    ];
    assert.throws(() => assertRatingCurve(curve), failsWith('INVALID_CURVE'));
  });

  test('rejects negative values', () => {
    const curve: RatingCurve = [
      { flow: -5, depth: 0 },
      { flow: 10, depth: 0.5 },
    ];
    assert.throws(() => assertRatingCurve(curve), failsWith('INVALID_CURVE'));
  });
});
