import type { Finding } from '../../report/reportTypes.js';
import type { EnvironmentConfig } from '../../databaseConfig/load.js';

export function checkPreparedStatements(env: EnvironmentConfig): readonly Finding[] {
  const value = env.settings['prepared_statements'];
  const location = { kind: 'config', environment: env.name, setting: 'prepared_statements' } as const;

  if (value === false) {
    return [{
      type: 'prepared_statements',
      severity: 'info',
      message: 'Prepared statements are disabled',
      suggestion: 'Prepared statements improve performance. Only disable if using PgBouncer in transaction mode',
      location,
      dedupKey: null,
    }];
  }

  if ((value === undefined || value === null) && env.name === 'production') {
    return [{
      type: 'prepared_statements',
      severity: 'info',
      message: 'Prepared statements setting not explicit',
      suggestion: 'Add prepared_statements: true for better query performance (enabled by default)',
      location,
      dedupKey: null,
    }];
  }

  return [];
}
