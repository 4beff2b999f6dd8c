import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadDatabaseConfig, parseDatabaseConfig, stripErb } from '../../src/core/databaseConfig/load.js';
import { ConfigParseError } from '../../src/util/errors.js';

const APP_DIR = resolve(import.meta.dirname, '../fixtures/rails-app');

describe('stripErb', () => {
  it('removes interpolation markers but keeps the expression', () => {
    expect(stripErb('pool: <%= ENV["MAX"] %>')).toBe('pool:  ENV["MAX"] ');
  });
});

describe('parseDatabaseConfig', () => {
  it('returns known environments in report order', () => {
    const content = [
      'production:',
      '  pool: 10',
      'development:',
      '  pool: 5',
      'staging:',
      '  pool: 7',
    ].join('\n');

    const envs = parseDatabaseConfig(content, 'database.yml');
    expect(envs.map((e) => e.name)).toEqual(['development', 'production']);
    expect(envs[1]!.settings).toEqual({ pool: 10 });
  });

  it('skips environments that are not mappings', () => {
    const envs = parseDatabaseConfig('development: sqlite\ntest:\n  pool: 1\n', 'database.yml');
    expect(envs.map((e) => e.name)).toEqual(['test']);
  });

  it('applies YAML merge keys', () => {
    const content = [
      'default: &default',
      '  pool: 5',
      '  connect_timeout: 2',
      'test:',
      '  <<: *default',
      '  pool: 3',
    ].join('\n');

    const envs = parseDatabaseConfig(content, 'database.yml');
    expect(envs[0]!.settings).toEqual({ pool: 3, connect_timeout: 2 });
  });

  it('rejects invalid YAML with ConfigParseError', () => {
    expect(() => parseDatabaseConfig('development: [unclosed', 'database.yml')).toThrow(ConfigParseError);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => parseDatabaseConfig('just text\n', 'database.yml')).toThrow(
      'Error parsing database.yml (database.yml): expected a mapping of environment names to settings',
    );
  });
});

describe('loadDatabaseConfig', () => {
  it('loads the fixture and keeps ERB values as strings', async () => {
    const envs = await loadDatabaseConfig(resolve(APP_DIR, 'config/database.yml'));

    expect(envs.map((e) => e.name)).toEqual(['development', 'test', 'production']);
    expect(envs[0]!.settings['pool']).toBe('ENV.fetch("RAILS_MAX_THREADS") { 5 }');
    expect(envs[1]!.settings['pool']).toBe(2);
    expect(envs[2]!.settings['variables']).toEqual({ statement_timeout: 15000 });
  });
});
