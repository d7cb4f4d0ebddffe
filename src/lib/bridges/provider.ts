/**
 * Bridge Record Provider
 *
 * Resolves a bridge UUID to its static BridgeRecord.
 *
 * CACHING:
 * - Records are static reference data: once parsed they are kept for the
 *   life of the process, keyed by UUID.
 * - Misses are not cached; a bridge added to the store later resolves on the
 *   next request.
 * - Single flight: concurrent misses for the same UUID share one fetch.
 *
 * FAILURES:
 * - Not found -> null
 * - Invalid record / rating curve -> thrown immediately, never retried
 * - Transient source failures and timeouts -> retried with linear backoff,
 *   then PROVIDER_UNAVAILABLE
 * - A timed-out attempt is aborted and allowed to settle before the next one
 *   starts, so the store sees at most one fetch per UUID at a time.
 */

import type { BridgeRecord } from '@/types/bridge';
import {
  BridgeForecastError,
  invalidRecord,
  isBridgeForecastError,
  providerUnavailable,
} from './errors';
import { parseBridgeRecord } from './record-schema';

/**
 * Where raw bridge JSON comes from.
 * Resolves null when no object exists for the UUID. The provider aborts
 * `signal` when an attempt times out and waits for the returned promise to
 * settle, so sources should settle promptly once it fires.
 */
export interface BridgeRecordSource {
  readonly name: string;
  fetchRecord(bridgeId: string, signal?: AbortSignal): Promise<unknown | null>;
}

export interface BridgeRecordProviderOptions {
  /** Per-attempt timeout */
  timeoutMs?: number;
  maxAttempts?: number;
  /** Backoff before retry n is retryDelayMs * n */
  retryDelayMs?: number;
  debug?: boolean;
}

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_DELAY_MS = 250;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timer; the timer is always cleared.
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(providerUnavailable(`${label} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export class BridgeRecordProvider {
  private readonly records = new Map<string, BridgeRecord>();
  private readonly inflight = new Map<string, Promise<BridgeRecord | null>>();

  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly debug: boolean;

  constructor(
    private readonly source: BridgeRecordSource,
    options: BridgeRecordProviderOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.debug = options.debug ?? false;
  }

  /**
   * Cached record, or a single shared fetch on a miss.
   */
  get(bridgeId: string): Promise<BridgeRecord | null> {
    const cached = this.records.get(bridgeId);
    if (cached) {
      if (this.debug) {
        console.log('[BRIDGE_PROVIDER] cache hit', { bridgeId });
      }
      return Promise.resolve(cached);
    }

    const pending = this.inflight.get(bridgeId);
    if (pending) {
      if (this.debug) {
        console.log('[BRIDGE_PROVIDER] joining in-flight fetch', { bridgeId });
      }
      return pending;
    }

    const load = this.load(bridgeId).finally(() => {
      this.inflight.delete(bridgeId);
    });
    this.inflight.set(bridgeId, load);
    return load;
  }

  /** Number of parsed records held */
  get size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
  }

  private async load(bridgeId: string): Promise<BridgeRecord | null> {
    const raw = await this.fetchWithRetry(bridgeId);

    if (raw === null) {
      console.warn(`[BRIDGE_PROVIDER] No bridge record for ${bridgeId} in ${this.source.name}`);
      return null;
    }

    const record = parseBridgeRecord(raw);
    if (record.id !== bridgeId) {
      throw invalidRecord(`Stored record for ${bridgeId} carries uuid ${record.id}`);
    }

    this.records.set(bridgeId, record);
    if (this.debug) {
      console.log('[BRIDGE_PROVIDER] cached record', {
        bridgeId,
        stations: record.crossSection.length,
        ratingSamples: record.ratingCurve.length,
        cacheSize: this.records.size,
      });
    }
    return record;
  }

  private async fetchWithRetry(bridgeId: string): Promise<unknown | null> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const controller = new AbortController();
      const fetching = this.source.fetchRecord(bridgeId, controller.signal);

      try {
        return await withTimeout(fetching, this.timeoutMs, `Fetch of ${bridgeId} from ${this.source.name}`);
      } catch (error) {
        controller.abort();
        await Promise.allSettled([fetching]);

        if (isBridgeForecastError(error) && !error.retryable) {
          throw error;
        }

        lastError = error;
        const reason = error instanceof Error ? error.message : String(error);
        console.warn(
          `[BRIDGE_PROVIDER] Attempt ${attempt}/${this.maxAttempts} for ${bridgeId} failed: ${reason}`
        );

        if (attempt < this.maxAttempts && this.retryDelayMs > 0) {
          await sleep(this.retryDelayMs * attempt);
        }
      }
    }

    console.error(`[BRIDGE_PROVIDER] Giving up on ${bridgeId} after ${this.maxAttempts} attempts`);
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    throw new BridgeForecastError(
      `Bridge store unavailable for ${bridgeId}: ${reason}`,
      'PROVIDER_UNAVAILABLE',
      true
    );
  }
}
