/**
 * Supabase Storage Bridge Source
 *
 * Reads <prefix><uuid>.json objects from a Storage bucket. The bucket and
 * prefix come from BridgeEngineConfig.storage; nothing here reads the
 * environment.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { invalidRecord, providerUnavailable } from './errors';
import type { BridgeRecordSource } from './provider';

/**
 * The slice of the Storage file API this source uses.
 */
export interface BridgeObjectBucket {
  download(path: string): PromiseLike<{ data: Blob | null; error: unknown }>;
}

export interface StorageLocation {
  bucket: string;
  prefix: string;
}

/**
 * HTTP status carried by a storage error, if any. Storage errors expose it
 * as `status`, `statusCode`, or on the wrapped response in `originalError`.
 */
export function storageErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'string') {
    const parsed = parseInt(error.statusCode, 10);
    if (!Number.isNaN(parsed)) return parsed;
  }
  if ('originalError' in error) {
    return storageErrorStatus(error.originalError);
  }
  return null;
}

function isNotFound(error: unknown): boolean {
  if (storageErrorStatus(error) === 404) return true;
  return error instanceof Error && /not found/i.test(error.message);
}

export function objectPathFor(location: StorageLocation, bridgeId: string): string {
  return `${location.prefix}${bridgeId}.json`;
}

export class SupabaseStorageBridgeSource implements BridgeRecordSource {
  readonly name: string;

  constructor(
    private readonly bucket: BridgeObjectBucket,
    private readonly location: StorageLocation
  ) {
    this.name = `storage://${location.bucket}/${location.prefix}`;
  }

  static fromClient(client: SupabaseClient, location: StorageLocation): SupabaseStorageBridgeSource {
    return new SupabaseStorageBridgeSource(client.storage.from(location.bucket), location);
  }

  async fetchRecord(bridgeId: string, signal?: AbortSignal): Promise<unknown | null> {
    const path = objectPathFor(this.location, bridgeId);
    const { data, error } = await this.bucket.download(path);

    if (signal?.aborted) {
      throw providerUnavailable(`Storage download of ${path} was abandoned`);
    }

    if (error) {
      if (isNotFound(error)) {
        return null;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw providerUnavailable(`Storage download of ${path} failed: ${reason}`);
    }

    if (!data) {
      return null;
    }

    const text = await data.text();
    try {
      return JSON.parse(text);
    } catch (parseError) {
      const reason = parseError instanceof Error ? parseError.message : String(parseError);
      throw invalidRecord(`Object ${path} is not valid JSON: ${reason}`);
    }
  }
}
