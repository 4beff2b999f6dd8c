import type { Finding } from '../../report/reportTypes.js';
import type { EnvironmentConfig } from '../../databaseConfig/load.js';

const MIN_POOL_SIZE = 5;
const MAX_POOL_SIZE = 20;

/**
 * Check the `pool` setting.
 *
 * A missing pool falls back to ActiveRecord's default of 5, which rarely
 * matches the server's thread count. Non-integer values (typically ERB that
 * reads RAILS_MAX_THREADS) cannot be judged and are left alone.
 */
export function checkConnectionPool(env: EnvironmentConfig): readonly Finding[] {
  const pool = env.settings['pool'];
  const location = { kind: 'config', environment: env.name, setting: 'pool' } as const;

  if (pool === undefined || pool === null) {
    return [{
      type: 'connection_pool_size',
      severity: 'warning',
      message: 'Connection pool size not explicitly set (defaults to 5)',
      suggestion: 'Set pool size based on your application threads/workers. For Puma with 5 threads: pool: 5',
      location,
      dedupKey: null,
    }];
  }

  if (typeof pool !== 'number' || !Number.isInteger(pool)) {
    return [];
  }

  if (pool < MIN_POOL_SIZE) {
    return [{
      type: 'connection_pool_size',
      severity: 'warning',
      message: `Connection pool size (${String(pool)}) is quite small`,
      suggestion: 'Consider increasing pool size to match your web server threads/workers',
      location,
      dedupKey: null,
    }];
  }

  if (pool > MAX_POOL_SIZE) {
    return [{
      type: 'connection_pool_size',
      severity: 'info',
      message: `Connection pool size (${String(pool)}) is quite large`,
      suggestion: 'Verify this matches your actual concurrency needs. Too many connections can strain PostgreSQL',
      location,
      dedupKey: null,
    }];
  }

  return [];
}
