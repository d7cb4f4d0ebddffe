import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { computeWarningZoneLimits } from './warning-zones';

describe('computeWarningZoneLimits', () => {
  test('deep section gets all three bands and the ground buffer', () => {
    assert.deepEqual(computeWarningZoneLimits([105, 101, 100, 101.5, 106], 108, 100), [6, 7.5, 6, 3, -1]);
  });

  test('low chord 1.5 ft up cuts the second band at the buffer', () => {
    assert.deepEqual(computeWarningZoneLimits([100, 103], 101.5, 100), [3, 1, -1]);
  });

  test('low chord 3 ft up stops after the second band', () => {
    assert.deepEqual(computeWarningZoneLimits([100, 103], 103, 100), [3, 2.5, 1, -1]);
  });

  test('limits are rounded to hundredths', () => {
    assert.deepEqual(computeWarningZoneLimits([100, 103], 101.333, 100), [3, 0.83, -1]);
  });
});
