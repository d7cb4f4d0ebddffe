/**
 * Forecast Query Parsing
 *
 * GET /xs/?uuid=<bridge>&list_flows=10,20,...,180&first_utc_time=2024-02-04T19:00:00
 *
 * Legacy error codes are kept in `legacyCode` for existing map clients:
 * - 002: required parameter missing
 * - 003a: non-numeric flow
 * - 003b: negative flow
 * - 003c: wrong number of flows
 * - 004: unparseable start time
 * - 005: unknown bridge
 */

import { parseISO } from 'date-fns';
import { z } from 'zod';
import type { ForecastRequest } from '@/types/bridge';
import { BridgeForecastError, emptyForecast } from './errors';

export const REQUIRED_QUERY_PARAMS = ['uuid', 'list_flows', 'first_utc_time'] as const;

/** Short-range forecasts carry 18 hourly flows */
export const DEFAULT_FORECAST_STEPS = 18;

export interface ForecastQueryOptions {
  /** 0 accepts any non-empty list */
  expectedSteps?: number;
}

const BridgeIdSchema = z.string().uuid();

function queryError(message: string, legacyCode: string): BridgeForecastError {
  return new BridgeForecastError(message, 'INVALID_FORECAST', false, legacyCode);
}

/**
 * "10,20,30" or "[10, 20, 30]" -> [10, 20, 30]
 */
export function parseFlowList(text: string): number[] {
  const inner = text.trim().replace(/^[[(]/, '').replace(/[\])]$/, '').trim();
  if (inner.length === 0) {
    return [];
  }

  return inner.split(',').map((token, index) => {
    const trimmed = token.trim();
    const value = trimmed.length > 0 ? Number(trimmed) : Number.NaN;

    if (!Number.isFinite(value)) {
      throw queryError(`Flow ${index} ("${trimmed}") is not a number`, '003a');
    }
    if (value < 0) {
      throw queryError(`Flow ${index} (${value}) is negative`, '003b');
    }
    return value;
  });
}

/**
 * ISO-8601 start time. A timestamp without an offset is UTC.
 */
export function parseStartTime(text: string): Date {
  let iso = text.trim();

  // A raw "+" in a query string arrives as a space. Only an offset after a
  // time part is restored: "2024-02-04 19:00" is a date and a time.
  iso = iso.replace(/([T ]\d{2}(?::?\d{2}){0,2}(?:\.\d+)?) (\d{2}:?\d{2})$/, '$1+$2');

  if (/^\d{4}-\d{2}-\d{2}$/.test(iso)) {
    iso = `${iso}T00:00:00Z`;
  } else if (!/(Z|[+-]\d{2}(:?\d{2})?)$/i.test(iso)) {
    iso = `${iso}Z`;
  }

  const date = parseISO(iso);
  if (Number.isNaN(date.getTime())) {
    throw queryError(`first_utc_time "${text}" is not an ISO-8601 timestamp`, '004');
  }
  return date;
}

export function parseForecastQuery(
  params: URLSearchParams,
  options: ForecastQueryOptions = {}
): ForecastRequest {
  const missing = REQUIRED_QUERY_PARAMS.filter((name) => params.get(name) === null);
  if (missing.length > 0) {
    throw queryError(`Missing required parameters: ${missing.join(', ')}`, '002');
  }

  const uuid = (params.get('uuid') ?? '').trim();
  if (!BridgeIdSchema.safeParse(uuid).success) {
    throw new BridgeForecastError(`"${uuid}" is not a bridge UUID`, 'UNKNOWN_BRIDGE', false, '005');
  }

  const flows = parseFlowList(params.get('list_flows') ?? '');
  if (flows.length === 0) {
    throw emptyForecast();
  }

  const expectedSteps = options.expectedSteps ?? DEFAULT_FORECAST_STEPS;
  if (expectedSteps > 0 && flows.length !== expectedSteps) {
    throw queryError(`list_flows must contain exactly ${expectedSteps} values, got ${flows.length}`, '003c');
  }

  return {
    bridgeId: uuid,
    flows,
    startTime: parseStartTime(params.get('first_utc_time') ?? ''),
  };
}
