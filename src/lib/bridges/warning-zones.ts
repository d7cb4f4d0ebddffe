/**
 * Warning Zone Limits
 *
 * Depth bands shaded on the forecast depth chart, measured from the channel
 * invert. The list runs top to bottom: the section's full depth, then the
 * floor of each band below the low chord (0.5 ft, 2.0 ft, 5.0 ft). A band
 * that would start below the channel bottom is cut off at the ground buffer.
 */

/** Bands below the low chord, ft */
export const WARNING_ZONE_OFFSETS_FT = [0.5, 2.0, 5.0] as const;

/** Floor used when a band reaches past the channel bottom */
export const ZONE_GROUND_BUFFER_FT = -1.0;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function computeWarningZoneLimits(
  groundElevations: readonly number[],
  lowChordElevation: number,
  channelInvertElevation: number
): number[] {
  const [first, second, third] = WARNING_ZONE_OFFSETS_FT;
  const depthToLowChord = lowChordElevation - channelInvertElevation;
  const sectionDepth = Math.max(...groundElevations) - channelInvertElevation;

  const limits = [sectionDepth, depthToLowChord - first];

  if (depthToLowChord > first) {
    limits.push(depthToLowChord > second ? depthToLowChord - second : ZONE_GROUND_BUFFER_FT);
  }

  if (depthToLowChord > second) {
    limits.push(depthToLowChord > third ? depthToLowChord - third : ZONE_GROUND_BUFFER_FT);
  }

  if (depthToLowChord > third) {
    limits.push(ZONE_GROUND_BUFFER_FT);
  }

  return limits.map(round2);
}
