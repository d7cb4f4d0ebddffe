// Bridge Flood Forecast Type Definitions

// ============ Enums & Constants ============

export type RiskLevel =
  | 'clear'
  | 'approaching_low_chord'
  | 'low_chord_submerged'
  | 'deck_submerged';

/** Least to most severe */
export const RISK_LEVEL_ORDER: readonly RiskLevel[] = [
  'clear',
  'approaching_low_chord',
  'low_chord_submerged',
  'deck_submerged',
] as const;

// ============ Static Bridge Data ============

export interface RatingSample {
  flow: number; // cfs
  depth: number; // feet above channel invert
}

/** Flow strictly ascending, depth non-decreasing */
export type RatingCurve = readonly RatingSample[];

export interface CrossSectionPoint {
  station: number; // feet along the section
  groundElevation: number; // feet
  deckElevation: number; // feet
  lowChordElevation: number; // feet
}

export interface BridgeAnnotations {
  latLong: string | null;
  nbi: string | null;
  comid: string | null;
}

export interface BridgeRecord {
  id: string;
  reachId: string | null;
  title: string | null;
  annotations: BridgeAnnotations;
  crossSection: readonly CrossSectionPoint[];
  ratingCurve: RatingCurve;
  lowChordElevation: number;
  deckElevation: number;
  /** Lowest ground elevation; the datum depths are measured from */
  channelInvertElevation: number;
  /** Depth limits of the shaded warning bands, top first */
  warningZoneLimits: readonly number[];
}

// ============ Forecast ============

export interface ForecastRequest {
  bridgeId: string;
  flows: readonly number[];
  /** UTC time of step 0 */
  startTime: Date;
}

export interface DepthSample {
  step: number;
  timestamp: string; // ISO, UTC
  flow: number;
  depth: number;
  waterSurfaceElevation: number;
  riskLevel: RiskLevel;
}

export interface DepthProfile {
  bridgeId: string;
  startTime: string;
  samples: DepthSample[];
  overallRisk: RiskLevel;
}

// ============ Render Boundary ============

export interface StationElevation {
  station: number;
  elevation: number;
}

export interface CrossSectionFrame {
  step: number;
  timestamp: string;
  /** e.g. "+1hr: Sun, Feb 04 01PM CST" */
  label: string;
  flow: number;
  depth: number;
  riskLevel: RiskLevel;
  riskLabel: string;
  waterSurfaceElevation: number;
  waterSurface: [StationElevation, StationElevation];
}

export interface CrossSectionRenderModel {
  bridgeId: string;
  reachId: string | null;
  title: string | null;
  annotations: BridgeAnnotations;
  forecastStart: string;
  siteTimeZone: string;
  geometry: {
    stations: number[];
    groundElevations: number[];
    deckElevations: number[];
    lowChordElevations: number[];
    channelInvertElevation: number;
    /** Floor of the ground fill */
    groundFillElevation: number;
  };
  referenceLines: {
    lowChordElevation: number;
    deckElevation: number;
    /** Low chord measured as a depth above the invert */
    lowChordDepth: number;
  };
  warningZoneLimits: number[];
  frames: CrossSectionFrame[];
  overallRisk: RiskLevel;
}

export interface BridgeForecastResult {
  profile: DepthProfile;
  crossSection: CrossSectionRenderModel;
}
