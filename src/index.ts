export type {
  AnalysisResult,
  AnalysisKind,
  AnalysisMetadata,
  IndexAnalysisResult,
  NPlusOneAnalysisResult,
  ConfigAnalysisResult,
  Finding,
  FindingType,
  FindingLocation,
  FindingGroup,
  FindingSummary,
  SchemaLocation,
  SourceLocation,
  QueryLocation,
  ConfigLocation,
  ScanError,
  Severity,
  OutputFormat,
  FormatOptions,
} from './core/report/reportTypes.js';

export type { Table, SchemaModel } from './core/railsSchema/types.js';
export type { Associations, ModelAssociations } from './core/railsSchema/extract.js';
export type { ConfigRecord } from './core/databaseConfig/schema.js';
export type { EnvironmentConfig } from './core/databaseConfig/load.js';

export { buildSchemaModel, parseSchemaFile } from './core/railsSchema/parse.js';
export { aggregateFindings } from './core/report/aggregate.js';
export { findProjectRoot } from './core/project/findRoot.js';
export * from './util/errors.js';

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parseSchemaFile } from './core/railsSchema/parse.js';
import { collectAssociations } from './core/railsSchema/extract.js';
import { loadDatabaseConfig } from './core/databaseConfig/load.js';
import { DATABASE_CONFIG_FILE, SCHEMA_FILE } from './core/project/findRoot.js';
import { scanFiles } from './core/project/scan.js';
import { checkFkIndexes } from './core/analysis/schemaChecks/checkFkIndexes.js';
import { checkBooleanColumns } from './core/analysis/schemaChecks/checkBooleanColumns.js';
import { checkWhereClauses, WHERE_CLAUSE_GLOBS } from './core/analysis/sourceChecks/checkWhereClauses.js';
import { checkControllerQueries, CONTROLLER_GLOBS } from './core/analysis/sourceChecks/checkControllerQueries.js';
import { checkViewAssociations, VIEW_GLOBS } from './core/analysis/sourceChecks/checkViewAssociations.js';
import { checkConnectionPool } from './core/analysis/configChecks/checkConnectionPool.js';
import { checkTimeouts } from './core/analysis/configChecks/checkTimeouts.js';
import { checkPreparedStatements } from './core/analysis/configChecks/checkPreparedStatements.js';
import { checkReapingFrequency } from './core/analysis/configChecks/checkReapingFrequency.js';
import { checkSsl } from './core/analysis/configChecks/checkSsl.js';
import { suggestExtensions } from './core/analysis/configChecks/suggestExtensions.js';
import { aggregateFindings } from './core/report/aggregate.js';
import { ConfigFileMissingError, SchemaFileMissingError } from './util/errors.js';
import type {
  AnalysisMetadata,
  ConfigAnalysisResult,
  Finding,
  FindingSummary,
  IndexAnalysisResult,
  NPlusOneAnalysisResult,
} from './core/report/reportTypes.js';

/** Options shared by every analysis. */
export interface AnalyzeOptions {
  /** Rails application root (the directory holding config/application.rb). */
  readonly root: string;
  readonly noTimestamp?: boolean | undefined;
}

/** Models with association declarations, for the N+1 report. */
const MODEL_GLOBS: readonly string[] = ['app/models/**/*.rb'];

/**
 * Look for indexing opportunities: unindexed foreign keys and boolean
 * columns in db/schema.rb, and columns filtered on by `.where` calls.
 */
export async function analyzeIndexes(options: AnalyzeOptions): Promise<IndexAnalysisResult> {
  const schemaPath = join(options.root, SCHEMA_FILE);
  if (!existsSync(schemaPath)) {
    throw new SchemaFileMissingError(schemaPath);
  }

  const schema = await parseSchemaFile(schemaPath);
  const whereClauses = await scanFiles(options.root, WHERE_CLAUSE_GLOBS, checkWhereClauses);

  const summary = aggregateFindings([
    ...checkFkIndexes(schema),
    ...whereClauses.items,
    ...checkBooleanColumns(schema),
  ]);

  return {
    kind: 'indexes',
    schema,
    summary,
    scanErrors: whereClauses.errors,
    metadata: buildMetadata(options, summary, whereClauses.filesScanned + 1),
  };
}

/**
 * Look for N+1 query patterns in controllers and association walks in views.
 */
export async function analyzeNPlusOne(options: AnalyzeOptions): Promise<NPlusOneAnalysisResult> {
  const controllers = await scanFiles(options.root, CONTROLLER_GLOBS, checkControllerQueries);
  const views = await scanFiles(options.root, VIEW_GLOBS, checkViewAssociations);
  const models = await scanFiles(options.root, MODEL_GLOBS, collectAssociations);

  const findings: readonly Finding[] = [...controllers.items, ...views.items];
  const summary = aggregateFindings(findings);

  return {
    kind: 'n-plus-one',
    associations: models.items,
    summary,
    scanErrors: [...controllers.errors, ...views.errors, ...models.errors],
    metadata: buildMetadata(
      options,
      summary,
      controllers.filesScanned + views.filesScanned + models.filesScanned,
    ),
  };
}

/**
 * Review config/database.yml connection settings for each environment.
 */
export async function analyzeConfig(options: AnalyzeOptions): Promise<ConfigAnalysisResult> {
  const configPath = join(options.root, DATABASE_CONFIG_FILE);
  if (!existsSync(configPath)) {
    throw new ConfigFileMissingError(configPath);
  }

  const environments = await loadDatabaseConfig(configPath);
  const findings: Finding[] = [];
  for (const env of environments) {
    findings.push(
      ...checkConnectionPool(env),
      ...checkTimeouts(env),
      ...checkPreparedStatements(env),
      ...checkReapingFrequency(env),
      ...checkSsl(env),
    );
  }
  findings.push(...suggestExtensions());

  const summary = aggregateFindings(findings);

  return {
    kind: 'config',
    environments: environments.map((env) => env.name),
    summary,
    scanErrors: [],
    metadata: buildMetadata(options, summary, 1),
  };
}

function buildMetadata(options: AnalyzeOptions, summary: FindingSummary, filesScanned: number): AnalysisMetadata {
  return {
    root: options.root,
    timestamp: options.noTimestamp === true ? null : new Date().toISOString(),
    findingCount: summary.findings.length,
    filesScanned,
  };
}
