import type { Finding } from '../../report/reportTypes.js';
import type { EnvironmentConfig } from '../../databaseConfig/load.js';
import { configRecordSchema } from '../../databaseConfig/schema.js';

/**
 * Check that statement, connect and checkout timeouts are configured.
 * `statement_timeout` is a session variable and lives under `variables:`.
 */
export function checkTimeouts(env: EnvironmentConfig): readonly Finding[] {
  const findings: Finding[] = [];
  const { settings } = env;

  const variables = configRecordSchema.safeParse(settings['variables']);
  if (!variables.success || !Object.hasOwn(variables.data, 'statement_timeout')) {
    findings.push({
      type: 'statement_timeout',
      severity: 'warning',
      message: 'statement_timeout not configured',
      suggestion: 'Add to database.yml:\n  variables:\n    statement_timeout: 30000  # 30 seconds in milliseconds',
      location: { kind: 'config', environment: env.name, setting: 'statement_timeout' },
      dedupKey: null,
    });
  }

  if (!Object.hasOwn(settings, 'connect_timeout')) {
    findings.push({
      type: 'connect_timeout',
      severity: 'info',
      message: 'connect_timeout not configured',
      suggestion: 'Add connect_timeout: 5 to prevent hanging on database connection issues',
      location: { kind: 'config', environment: env.name, setting: 'connect_timeout' },
      dedupKey: null,
    });
  }

  if (!Object.hasOwn(settings, 'checkout_timeout')) {
    findings.push({
      type: 'checkout_timeout',
      severity: 'info',
      message: 'checkout_timeout not configured (defaults to 5 seconds)',
      suggestion: 'Explicitly set checkout_timeout: 5 for clarity',
      location: { kind: 'config', environment: env.name, setting: 'checkout_timeout' },
      dedupKey: null,
    });
  }

  return findings;
}
