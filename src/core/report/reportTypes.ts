import type { SchemaModel } from '../railsSchema/types.js';
import type { ModelAssociations } from '../railsSchema/extract.js';
import type { ErrorCode } from '../../util/errors.js';

/** Severity levels for findings. */
export type Severity = 'warning' | 'info';

/** Every finding type, in the order reports list them. */
export const FINDING_TYPES = [
  'missing_foreign_key_index',
  'boolean_index_opportunity',
  'where_clause_column',
  'potential_n_plus_one',
  'view_association_access',
  'connection_pool_size',
  'statement_timeout',
  'connect_timeout',
  'checkout_timeout',
  'prepared_statements',
  'reaping_frequency',
  'ssl_configuration',
  'performance_extensions',
] as const;

export type FindingType = (typeof FINDING_TYPES)[number];

/** A column in db/schema.rb. */
export interface SchemaLocation {
  readonly kind: 'schema';
  readonly table: string;
  readonly column: string;
}

/** A line in an application source file, relative to the project root. */
export interface SourceLocation {
  readonly kind: 'source';
  readonly file: string;
  readonly line: number;
}

/** A column filtered on by a `.where` call in a source file. */
export interface QueryLocation {
  readonly kind: 'query';
  readonly file: string;
  readonly line: number;
  readonly column: string;
}

/** A setting of one environment in config/database.yml. */
export interface ConfigLocation {
  readonly kind: 'config';
  readonly environment: string;
  readonly setting: string;
}

export type FindingLocation = SchemaLocation | SourceLocation | QueryLocation | ConfigLocation;

/** A single analyzer observation. */
export interface Finding {
  readonly type: FindingType;
  readonly severity: Severity;
  readonly message: string;
  readonly suggestion: string | null;
  readonly location: FindingLocation;
  /** Findings sharing a non-null key are reported once. */
  readonly dedupKey: string | null;
}

/** All findings of one type, split by severity, with a bounded preview. */
export interface FindingGroup {
  readonly type: FindingType;
  readonly count: number;
  readonly bySeverity: Readonly<Record<Severity, readonly Finding[]>>;
  readonly preview: readonly Finding[];
  /** Entries left out of the preview. */
  readonly overflow: number;
}

/** Deduplicated findings grouped for display. */
export interface FindingSummary {
  readonly findings: readonly Finding[];
  readonly groups: readonly FindingGroup[];
  readonly severityCounts: Readonly<Record<Severity, number>>;
}

/** A source file that could not be read during a scan. */
export interface ScanError {
  readonly file: string;
  readonly code: ErrorCode;
  readonly message: string;
}

/** Which analysis produced a result. */
export type AnalysisKind = 'indexes' | 'n-plus-one' | 'config';

/** Output format options. */
export type OutputFormat = 'json' | 'text';

/** Options controlling formatter output. */
export interface FormatOptions {
  readonly findingsOnly?: boolean | undefined;
}

/** Metadata about the analysis run. */
export interface AnalysisMetadata {
  readonly root: string;
  readonly timestamp: string | null;
  readonly findingCount: number;
  readonly filesScanned: number;
}

interface BaseAnalysisResult {
  readonly summary: FindingSummary;
  readonly scanErrors: readonly ScanError[];
  readonly metadata: AnalysisMetadata;
}

export interface IndexAnalysisResult extends BaseAnalysisResult {
  readonly kind: 'indexes';
  readonly schema: SchemaModel;
}

export interface NPlusOneAnalysisResult extends BaseAnalysisResult {
  readonly kind: 'n-plus-one';
  readonly associations: readonly ModelAssociations[];
}

export interface ConfigAnalysisResult extends BaseAnalysisResult {
  readonly kind: 'config';
  readonly environments: readonly string[];
}

export type AnalysisResult = IndexAnalysisResult | NPlusOneAnalysisResult | ConfigAnalysisResult;
