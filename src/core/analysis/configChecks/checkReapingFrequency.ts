import type { Finding } from '../../report/reportTypes.js';
import type { EnvironmentConfig } from '../../databaseConfig/load.js';

/** Production only: stale connections are not a concern elsewhere. */
export function checkReapingFrequency(env: EnvironmentConfig): readonly Finding[] {
  if (env.name !== 'production' || Object.hasOwn(env.settings, 'reaping_frequency')) {
    return [];
  }
  return [{
    type: 'reaping_frequency',
    severity: 'info',
    message: 'reaping_frequency not configured',
    suggestion: 'Consider adding reaping_frequency: 60 to clean up stale connections (seconds)',
    location: { kind: 'config', environment: env.name, setting: 'reaping_frequency' },
    dedupKey: null,
  }];
}
