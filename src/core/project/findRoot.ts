import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { ProjectRootNotFoundError } from '../../util/errors.js';

/** Path, relative to a Rails root, whose presence marks the root. */
export const ROOT_MARKER = join('config', 'application.rb');

/** Location of the schema dump relative to the root. */
export const SCHEMA_FILE = join('db', 'schema.rb');

/** Location of the database configuration relative to the root. */
export const DATABASE_CONFIG_FILE = join('config', 'database.yml');

/**
 * Walk upward from `startDir` to the first directory containing
 * config/application.rb.
 */
export function findProjectRoot(startDir: string): string {
  let current = resolve(startDir);
  for (;;) {
    if (existsSync(join(current, ROOT_MARKER))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      throw new ProjectRootNotFoundError(resolve(startDir));
    }
    current = parent;
  }
}
