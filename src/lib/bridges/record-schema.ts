/**
 * Stored Bridge JSON -> BridgeRecord
 *
 * Each bridge is stored as one JSON object (<uuid>.json) written by the
 * bridge catalog export. The export writes list columns as list text
 * ("[0.0, 12.5]") and the rating curve as tuple text ("[(0, 0.0), (10, 0.4)]");
 * plain JSON arrays are accepted too.
 *
 * A record that breaks the geometry or rating curve invariants is rejected
 * here, at load, so the interpolator only ever sees usable tables.
 */

import { z } from 'zod';
import type { BridgeRecord, CrossSectionPoint, RatingSample } from '@/types/bridge';
import { invalidCurve, invalidRecord } from './errors';
import { assertRatingCurve } from './rating-curve';
import { computeWarningZoneLimits } from './warning-zones';

/**
 * Turn list/tuple text into JSON and parse it. Anything that does not parse
 * is passed through so the schema reports it.
 */
function fromListText(value: unknown): unknown {
  if (typeof value !== 'string') return value;

  const normalized = value
    .replace(/\(/g, '[')
    .replace(/\)/g, ']')
    .replace(/,\s*\]/g, ']');

  try {
    return JSON.parse(normalized);
  } catch {
    return value;
  }
}

const NumberList = z.preprocess(fromListText, z.array(z.number()));

const RatingPairs = z.preprocess(fromListText, z.array(z.tuple([z.number(), z.number()])));

const OptionalText = z.string().nullish();

export const StoredBridgeSchema = z.object({
  uuid: z.string().min(1),
  sta: NumberList,
  ground_elv: NumberList,
  deck_elev: NumberList,
  low_ch_elv: NumberList,
  hand_r: RatingPairs,
  min_low_ch: z.number().nullish(),
  min_ground: z.number().nullish(),
  zone_limits: NumberList.optional(),
  feature_id: z.union([z.string(), z.number()]).nullish(),
  anno_xs_title: OptionalText,
  anno_latlong: OptionalText,
  anno_nbi: OptionalText,
  anno_comid: OptionalText,
});

export type StoredBridge = z.infer<typeof StoredBridgeSchema>;

/**
 * "NWM COMID: 5781369" -> "5781369"
 */
function reachIdFrom(stored: StoredBridge): string | null {
  if (stored.feature_id !== null && stored.feature_id !== undefined) {
    return String(stored.feature_id);
  }
  const match = stored.anno_comid?.match(/(\d+)\s*$/);
  return match ? match[1] : null;
}

function buildCrossSection(stored: StoredBridge): CrossSectionPoint[] {
  const { sta, ground_elv, deck_elev, low_ch_elv } = stored;

  if (sta.length === 0) {
    throw invalidRecord(`Bridge ${stored.uuid} has an empty cross-section`);
  }

  if (ground_elv.length !== sta.length || deck_elev.length !== sta.length || low_ch_elv.length !== sta.length) {
    throw invalidRecord(
      `Bridge ${stored.uuid} cross-section lists differ in length ` +
        `(sta=${sta.length}, ground=${ground_elv.length}, deck=${deck_elev.length}, low chord=${low_ch_elv.length})`
    );
  }

  return sta.map((station, i) => {
    if (!Number.isFinite(station) || station < 0) {
      throw invalidRecord(`Bridge ${stored.uuid} station ${i} is invalid (${station})`);
    }
    if (i > 0 && station <= sta[i - 1]) {
      throw invalidRecord(`Bridge ${stored.uuid} stations must strictly increase (station ${i}: ${station})`);
    }
    return Object.freeze({
      station,
      groundElevation: ground_elv[i],
      deckElevation: deck_elev[i],
      lowChordElevation: low_ch_elv[i],
    });
  });
}

function buildRatingCurve(stored: StoredBridge): RatingSample[] {
  const curve = stored.hand_r.map(([flow, depth]) => Object.freeze({ flow, depth }));
  try {
    assertRatingCurve(curve);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalidCurve(`Bridge ${stored.uuid}: ${reason}`);
  }
  return curve;
}

/**
 * Validate stored JSON and build an immutable BridgeRecord.
 *
 * @throws BridgeForecastError INVALID_CURVE for a bad rating curve,
 *   INVALID_RECORD for anything else
 */
export function parseBridgeRecord(raw: unknown): BridgeRecord {
  const parsed = StoredBridgeSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues;
    const summary = issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    if (issues.some((issue) => issue.path[0] === 'hand_r')) {
      throw invalidCurve(`Invalid rating curve: ${summary}`);
    }
    throw invalidRecord(`Invalid bridge record: ${summary}`);
  }

  const stored = parsed.data;
  const crossSection = buildCrossSection(stored);
  const ratingCurve = buildRatingCurve(stored);

  const grounds = crossSection.map((p) => p.groundElevation);
  const channelInvertElevation = stored.min_ground ?? Math.min(...grounds);
  const lowChordElevation = stored.min_low_ch ?? Math.min(...crossSection.map((p) => p.lowChordElevation));
  const deckElevation = Math.min(...crossSection.map((p) => p.deckElevation));

  const warningZoneLimits =
    stored.zone_limits ?? computeWarningZoneLimits(grounds, lowChordElevation, channelInvertElevation);

  return Object.freeze({
    id: stored.uuid,
    reachId: reachIdFrom(stored),
    title: stored.anno_xs_title ?? null,
    annotations: Object.freeze({
      latLong: stored.anno_latlong ?? null,
      nbi: stored.anno_nbi ?? null,
      comid: stored.anno_comid ?? null,
    }),
    crossSection: Object.freeze(crossSection),
    ratingCurve: Object.freeze(ratingCurve),
    lowChordElevation,
    deckElevation,
    channelInvertElevation,
    warningZoneLimits: Object.freeze(warningZoneLimits),
  });
}
