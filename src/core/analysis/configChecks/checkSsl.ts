import type { Finding } from '../../report/reportTypes.js';
import type { EnvironmentConfig } from '../../databaseConfig/load.js';

/**
 * Production connections must not run without TLS.
 * Missing, empty, false and `disable` sslmode values all count as off.
 */
export function checkSsl(env: EnvironmentConfig): readonly Finding[] {
  if (env.name !== 'production') {
    return [];
  }

  const sslmode = env.settings['sslmode'];
  const enforced = typeof sslmode === 'string' && sslmode !== '' && sslmode !== 'disable';
  if (enforced) {
    return [];
  }

  return [{
    type: 'ssl_configuration',
    severity: 'warning',
    message: 'SSL/TLS not enforced for production database connections',
    suggestion: 'Add sslmode: require or sslmode: verify-full for secure connections',
    location: { kind: 'config', environment: env.name, setting: 'sslmode' },
    dedupKey: null,
  }];
}
