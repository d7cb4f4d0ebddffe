// Shared test data: a five-station bridge with its low chord 8 ft and its
// deck 10 ft above the channel invert (elevation 100).

import type { BridgeRecord } from '@/types/bridge';
import { parseBridgeRecord } from '../record-schema';
import basicBridge from './bridge-basic.json';

export const BASIC_BRIDGE_ID = basicBridge.uuid;

export function basicBridgeJson(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...basicBridge, ...overrides };
}

export function loadBasicBridge(): BridgeRecord {
  return parseBridgeRecord(basicBridgeJson());
}

/** 2024-02-04 19:00 UTC = 1 PM CST */
export const FORECAST_START = new Date('2024-02-04T19:00:00Z');
