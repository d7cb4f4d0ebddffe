/**
 * Cross-Section Render Model
 *
 * Joins a bridge's static geometry with a classified depth profile into the
 * structure the charting layer draws: the section polylines, the structure
 * reference lines, and one water-surface frame per forecast hour.
 *
 * Pure assembly. Depths, elevations and risk levels come from the profile
 * as-is.
 */

import type {
  BridgeRecord,
  CrossSectionFrame,
  CrossSectionRenderModel,
  DepthProfile,
} from '@/types/bridge';
import { BridgeForecastError } from './errors';
import { RISK_LEVEL_LABELS } from './risk';
import { DEFAULT_SITE_TIMEZONE, formatStepLabel } from './site-time';

/** Distance (ft) the ground fill extends below the channel invert */
export const GROUND_FILL_BUFFER_FT = 1.0;

export interface AssembleOptions {
  siteTimeZone?: string;
}

export function assembleCrossSection(
  record: BridgeRecord,
  profile: DepthProfile,
  options: AssembleOptions = {}
): CrossSectionRenderModel {
  if (profile.bridgeId !== record.id) {
    throw new BridgeForecastError(
      `Depth profile for ${profile.bridgeId} cannot be drawn on bridge ${record.id}`,
      'UNKNOWN_BRIDGE'
    );
  }

  const siteTimeZone = options.siteTimeZone ?? DEFAULT_SITE_TIMEZONE;
  const section = record.crossSection;
  const firstStation = section[0].station;
  const lastStation = section[section.length - 1].station;

  const frames: CrossSectionFrame[] = profile.samples.map((sample) => ({
    step: sample.step,
    timestamp: sample.timestamp,
    label: formatStepLabel(sample.step, sample.timestamp, siteTimeZone),
    flow: sample.flow,
    depth: sample.depth,
    riskLevel: sample.riskLevel,
    riskLabel: RISK_LEVEL_LABELS[sample.riskLevel],
    waterSurfaceElevation: sample.waterSurfaceElevation,
    waterSurface: [
      { station: firstStation, elevation: sample.waterSurfaceElevation },
      { station: lastStation, elevation: sample.waterSurfaceElevation },
    ],
  }));

  // Frames are chronological regardless of sample order
  frames.sort((a, b) => a.timestamp.localeCompare(b.timestamp) || a.step - b.step);

  return {
    bridgeId: record.id,
    reachId: record.reachId,
    title: record.title,
    annotations: { ...record.annotations },
    forecastStart: profile.startTime,
    siteTimeZone,
    geometry: {
      stations: section.map((p) => p.station),
      groundElevations: section.map((p) => p.groundElevation),
      deckElevations: section.map((p) => p.deckElevation),
      lowChordElevations: section.map((p) => p.lowChordElevation),
      channelInvertElevation: record.channelInvertElevation,
      groundFillElevation: record.channelInvertElevation - GROUND_FILL_BUFFER_FT,
    },
    referenceLines: {
      lowChordElevation: record.lowChordElevation,
      deckElevation: record.deckElevation,
      lowChordDepth: record.lowChordElevation - record.channelInvertElevation,
    },
    warningZoneLimits: [...record.warningZoneLimits],
    frames,
    overallRisk: profile.overallRisk,
  };
}
