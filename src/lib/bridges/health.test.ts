import { describe, test } from 'node:test';
import assert from 'node:assert/strict';
import { checkHealth } from './health';

describe('checkHealth', () => {
  test('up when Storage credentials are present', () => {
    assert.deepEqual(
      checkHealth({
        NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321',
        SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
      }),
      { status: 'up', storage: 'configured' }
    );
  });

  test('degraded without the service role key', () => {
    assert.deepEqual(checkHealth({ NEXT_PUBLIC_SUPABASE_URL: 'http://localhost:54321' }), {
      status: 'degraded',
      storage: 'unconfigured',
    });
  });

  test('degraded without the Supabase URL', () => {
    assert.deepEqual(checkHealth({ SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }).status, 'degraded');
  });
});
