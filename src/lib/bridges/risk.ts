/**
 * Bridge Submersion Risk
 *
 * Compares a forecast water surface against the bridge structure:
 * - deck_submerged: water at or above the road surface (overtopping)
 * - low_chord_submerged: water at or above the bottom of the beams
 * - approaching_low_chord: within the warning margin below the low chord
 * - clear: everything else
 */

import { RISK_LEVEL_ORDER, type RiskLevel } from '@/types/bridge';

/**
 * Default freeboard (ft) below the low chord that counts as approaching.
 * Matches the first warning band of the bridge catalog export.
 */
export const DEFAULT_WARNING_MARGIN_FT = 0.5;

export function waterSurfaceElevation(depth: number, channelInvertElevation: number): number {
  return channelInvertElevation + depth;
}

/**
 * Classify one depth sample. Thresholds are checked worst-first.
 */
export function classifyRisk(
  depth: number,
  lowChordElevation: number,
  deckElevation: number,
  channelInvertElevation: number,
  warningMarginFt: number = DEFAULT_WARNING_MARGIN_FT
): RiskLevel {
  const wsel = waterSurfaceElevation(depth, channelInvertElevation);

  if (wsel >= deckElevation) return 'deck_submerged';
  if (wsel >= lowChordElevation) return 'low_chord_submerged';
  if (wsel >= lowChordElevation - warningMarginFt) return 'approaching_low_chord';
  return 'clear';
}

export function riskRank(level: RiskLevel): number {
  return RISK_LEVEL_ORDER.indexOf(level);
}

export function compareRiskLevels(a: RiskLevel, b: RiskLevel): number {
  return riskRank(a) - riskRank(b);
}

/**
 * Worst level in a set of samples; 'clear' when there are none.
 */
export function maxRiskLevel(levels: Iterable<RiskLevel>): RiskLevel {
  let worst: RiskLevel = 'clear';
  for (const level of levels) {
    if (compareRiskLevels(level, worst) > 0) {
      worst = level;
    }
  }
  return worst;
}

export const RISK_LEVEL_LABELS: Record<RiskLevel, string> = {
  clear: 'Clear',
  approaching_low_chord: 'Approaching Low Chord',
  low_chord_submerged: 'Low Chord Submerged',
  deck_submerged: 'Deck Submerged',
};
