import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { configRecordSchema, databaseConfigSchema, ENVIRONMENTS } from './schema.js';
import type { ConfigRecord } from './schema.js';
import { ConfigParseError, describeError } from '../../util/errors.js';

/** An environment section of database.yml. */
export interface EnvironmentConfig {
  readonly name: string;
  readonly settings: ConfigRecord;
}

/**
 * Strip ERB interpolation markers so `<%= ENV.fetch(...) %>` survives YAML
 * parsing as a plain scalar.
 */
export function stripErb(content: string): string {
  return content.replaceAll('<%=', '').replaceAll('%>', '');
}

/**
 * Parse database.yml text into the environments the analyzers look at.
 * Environments that are absent or not mappings are skipped.
 */
export function parseDatabaseConfig(content: string, configPath: string): readonly EnvironmentConfig[] {
  let raw: unknown;
  try {
    raw = parseYaml(stripErb(content), { merge: true });
  } catch (error: unknown) {
    throw new ConfigParseError(configPath, describeError(error), error);
  }

  const document = databaseConfigSchema.safeParse(raw);
  if (!document.success) {
    throw new ConfigParseError(configPath, 'expected a mapping of environment names to settings');
  }

  const environments: EnvironmentConfig[] = [];
  for (const name of ENVIRONMENTS) {
    const settings = configRecordSchema.safeParse(document.data[name]);
    if (settings.success) {
      environments.push({ name, settings: settings.data });
    }
  }
  return environments;
}

/** Read and parse database.yml. */
export async function loadDatabaseConfig(configPath: string): Promise<readonly EnvironmentConfig[]> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigParseError(configPath, describeError(error), error);
  }
  return parseDatabaseConfig(content, configPath);
}
