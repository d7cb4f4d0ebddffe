import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { isBridgeForecastError } from './errors';
import {
  SupabaseStorageBridgeSource,
  objectPathFor,
  storageErrorStatus,
  type BridgeObjectBucket,
} from './storage-source';

const BRIDGE_ID = '6f1c2a4e-8b3d-4e5f-9a10-2b3c4d5e6f70';
const LOCATION = { bucket: 'txbridge-data', prefix: 'bridge_json/' };

class FakeBucket implements BridgeObjectBucket {
  readonly paths: string[] = [];

  constructor(private readonly result: { data: Blob | null; error: unknown }) {}

  async download(path: string): Promise<{ data: Blob | null; error: unknown }> {
    this.paths.push(path);
    return this.result;
  }
}

function storageError(message: string, fields: Record<string, unknown>): Error {
  return Object.assign(new Error(message), fields);
}

describe('SupabaseStorageBridgeSource', () => {
  test('downloads and parses <prefix><uuid>.json', async () => {
    const bucket = new FakeBucket({ data: new Blob([JSON.stringify({ uuid: BRIDGE_ID })]), error: null });
    const source = new SupabaseStorageBridgeSource(bucket, LOCATION);

    assert.deepEqual(await source.fetchRecord(BRIDGE_ID), { uuid: BRIDGE_ID });
    assert.deepEqual(bucket.paths, [`bridge_json/${BRIDGE_ID}.json`]);
  });

  test('names itself after the bucket and prefix', () => {
    const source = new SupabaseStorageBridgeSource(new FakeBucket({ data: null, error: null }), LOCATION);
    assert.equal(source.name, 'storage://txbridge-data/bridge_json/');
  });

  test('missing objects resolve null', async () => {
    const byStatus = new SupabaseStorageBridgeSource(
      new FakeBucket({ data: null, error: storageError('Request failed', { status: 404 }) }),
      LOCATION
    );
    const byMessage = new SupabaseStorageBridgeSource(
      new FakeBucket({ data: null, error: storageError('Object not found', { status: 400 }) }),
      LOCATION
    );
    const byStatusCode = new SupabaseStorageBridgeSource(
      new FakeBucket({ data: null, error: storageError('Request failed', { statusCode: '404' }) }),
      LOCATION
    );

    assert.equal(await byStatus.fetchRecord(BRIDGE_ID), null);
    assert.equal(await byMessage.fetchRecord(BRIDGE_ID), null);
    assert.equal(await byStatusCode.fetchRecord(BRIDGE_ID), null);
  });

  test('other storage errors are retryable PROVIDER_UNAVAILABLE', async () => {
    const source = new SupabaseStorageBridgeSource(
      new FakeBucket({ data: null, error: storageError('Bad gateway', { status: 502 }) }),
      LOCATION
    );

    await assert.rejects(
      source.fetchRecord(BRIDGE_ID),
      (error: unknown) =>
        isBridgeForecastError(error) && error.code === 'PROVIDER_UNAVAILABLE' && error.retryable
    );
  });

  test('a download finishing after abort is discarded', async () => {
    const bucket = new FakeBucket({ data: new Blob([JSON.stringify({ uuid: BRIDGE_ID })]), error: null });
    const source = new SupabaseStorageBridgeSource(bucket, LOCATION);
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      source.fetchRecord(BRIDGE_ID, controller.signal),
      (error: unknown) =>
        isBridgeForecastError(error) && error.code === 'PROVIDER_UNAVAILABLE' && error.message.includes('abandoned')
    );
  });

  test('unparseable JSON is INVALID_RECORD', async () => {
    const source = new SupabaseStorageBridgeSource(
      new FakeBucket({ data: new Blob(['{"uuid": ']), error: null }),
      LOCATION
    );

    await assert.rejects(
      source.fetchRecord(BRIDGE_ID),
      (error: unknown) => isBridgeForecastError(error) && error.code === 'INVALID_RECORD' && !error.retryable
    );
  });
});

describe('storageErrorStatus', () => {
  test('reads status from the error or its wrapped response', () => {
    assert.equal(storageErrorStatus({ status: 403 }), 403);
    assert.equal(storageErrorStatus({ statusCode: '409' }), 409);
    assert.equal(storageErrorStatus({ originalError: { status: 404 } }), 404);
    assert.equal(storageErrorStatus('boom'), null);
    assert.equal(storageErrorStatus({}), null);
  });
});

describe('objectPathFor', () => {
  test('joins prefix and uuid', () => {
    assert.equal(objectPathFor(LOCATION, BRIDGE_ID), `bridge_json/${BRIDGE_ID}.json`);
    assert.equal(objectPathFor({ bucket: 'b', prefix: '' }, BRIDGE_ID), `${BRIDGE_ID}.json`);
  });
});
