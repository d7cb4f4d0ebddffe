/**
 * Liveness report for GET /health.
 *
 * The process is up whenever it can answer. Missing Storage credentials mean
 * every /xs/ request would fail, so that is reported as degraded.
 */

import { isServiceRoleConfigured } from '@/lib/supabase/serverServiceClient';

export interface HealthReport {
  status: 'up' | 'degraded';
  storage: 'configured' | 'unconfigured';
}

export function checkHealth(env: Record<string, string | undefined> = process.env): HealthReport {
  if (!isServiceRoleConfigured(env)) {
    return { status: 'degraded', storage: 'unconfigured' };
  }
  return { status: 'up', storage: 'configured' };
}
