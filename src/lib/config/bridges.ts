/**
 * Bridge Engine Configuration
 *
 * Built once from the environment and passed to the provider and engine
 * explicitly. Engine modules never read process.env themselves.
 */

import { z } from 'zod';
import { DEFAULT_WARNING_MARGIN_FT } from '@/lib/bridges/risk';
import { DEFAULT_SITE_TIMEZONE, assertTimeZone } from '@/lib/bridges/site-time';
import type { StorageLocation } from '@/lib/bridges/storage-source';

const BridgeEnvSchema = z.object({
  // "<bucket>/<prefix>", optionally with an s3:// or supabase:// scheme
  PATH_TO_BRIDGE_JSONS: z.string().min(1).default('bridge-json/'),

  BRIDGE_WARNING_MARGIN_FT: z.coerce.number().nonnegative().default(DEFAULT_WARNING_MARGIN_FT),
  FORECAST_STEP_COUNT: z.coerce.number().int().nonnegative().default(18),
  SITE_TIMEZONE: z
    .string()
    .min(1)
    .default(DEFAULT_SITE_TIMEZONE)
    .refine(
      (zone) => {
        try {
          assertTimeZone(zone);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'Unknown IANA timezone' }
    ),

  BRIDGE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  BRIDGE_FETCH_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  BRIDGE_FETCH_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(250),

  DEBUG_BRIDGE_CACHE: z.string().optional(),
  NODE_ENV: z.string().optional(),
});

export interface BridgeEngineConfig {
  storage: StorageLocation;
  warningMarginFt: number;
  /** Flow count required at the web boundary; 0 accepts any non-empty list */
  expectedSteps: number;
  siteTimeZone: string;
  fetch: {
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  debugCache: boolean;
}

/**
 * "s3://txbridge-data/bridge_json" -> { bucket: 'txbridge-data', prefix: 'bridge_json/' }
 */
export function parseStorageLocation(value: string): StorageLocation {
  const withoutScheme = value.trim().replace(/^[a-z0-9+.-]+:\/\//i, '');
  const [bucket, ...rest] = withoutScheme.split('/');

  if (!bucket) {
    throw new Error(`Bridge JSON location "${value}" does not name a bucket`);
  }

  const path = rest.filter((segment) => segment.length > 0).join('/');
  return {
    bucket,
    prefix: path ? `${path}/` : '',
  };
}

export function loadBridgeConfig(env: Record<string, string | undefined> = process.env): BridgeEngineConfig {
  const parsed = BridgeEnvSchema.safeParse(env);
  if (!parsed.success) {
    console.error('[BRIDGE_CONFIG] Invalid bridge engine env:', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid bridge engine environment variables (see logs).');
  }

  const e = parsed.data;
  return {
    storage: parseStorageLocation(e.PATH_TO_BRIDGE_JSONS),
    warningMarginFt: e.BRIDGE_WARNING_MARGIN_FT,
    expectedSteps: e.FORECAST_STEP_COUNT,
    siteTimeZone: e.SITE_TIMEZONE,
    fetch: {
      timeoutMs: e.BRIDGE_FETCH_TIMEOUT_MS,
      maxAttempts: e.BRIDGE_FETCH_MAX_ATTEMPTS,
      retryDelayMs: e.BRIDGE_FETCH_RETRY_DELAY_MS,
    },
    debugCache: e.DEBUG_BRIDGE_CACHE === 'true' || e.NODE_ENV === 'development',
  };
}
