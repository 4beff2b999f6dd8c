import type { Finding } from '../../report/reportTypes.js';

/** Project-wide suggestion, reported once under the `all` environment. */
export function suggestExtensions(): readonly Finding[] {
  return [{
    type: 'performance_extensions',
    severity: 'info',
    message: 'Consider enabling pg_stat_statements extension',
    suggestion:
      "Enable in PostgreSQL config:\n  shared_preload_libraries = 'pg_stat_statements'\n" +
      'Then run: CREATE EXTENSION IF NOT EXISTS pg_stat_statements;',
    location: { kind: 'config', environment: 'all', setting: 'extensions' },
    dedupKey: null,
  }];
}
