/**
 * Process-wide Bridge Engine
 *
 * The record cache must outlive individual requests, so the provider is
 * created once per process. It lives on globalThis because Next.js can
 * hot-reload modules independently in development.
 */

import { loadBridgeConfig, type BridgeEngineConfig } from '@/lib/config/bridges';
import { createServiceRoleClient } from '@/lib/supabase/serverServiceClient';
import { BridgeRecordProvider } from './provider';
import { SupabaseStorageBridgeSource } from './storage-source';

export interface BridgeEngine {
  config: BridgeEngineConfig;
  provider: BridgeRecordProvider;
}

declare global {
  // eslint-disable-next-line no-var
  var bridgeFloodForecastEngine: BridgeEngine | undefined;
}

export function createBridgeEngine(env: Record<string, string | undefined> = process.env): BridgeEngine {
  const config = loadBridgeConfig(env);
  const client = createServiceRoleClient({ env });
  if (!client) {
    throw new Error('Supabase service role client unavailable');
  }

  const source = SupabaseStorageBridgeSource.fromClient(client, config.storage);
  const provider = new BridgeRecordProvider(source, {
    timeoutMs: config.fetch.timeoutMs,
    maxAttempts: config.fetch.maxAttempts,
    retryDelayMs: config.fetch.retryDelayMs,
    debug: config.debugCache,
  });

  console.log(`[BRIDGE_ENGINE] Initialized with ${source.name}`);
  return { config, provider };
}

export function getSharedBridgeEngine(): BridgeEngine {
  if (!globalThis.bridgeFloodForecastEngine) {
    globalThis.bridgeFloodForecastEngine = createBridgeEngine();
  }
  return globalThis.bridgeFloodForecastEngine;
}
