import type { AnalysisKind, AnalysisResult, Finding, FindingLocation, FindingType, FormatOptions } from './reportTypes.js';

const TITLES: Readonly<Record<AnalysisKind, string>> = {
  indexes: 'Index Analysis',
  'n-plus-one': 'N+1 Query Analysis',
  config: 'Database Configuration Analysis',
};

const GROUP_TITLES: Readonly<Record<FindingType, string>> = {
  missing_foreign_key_index: 'Missing Foreign Key Indexes',
  boolean_index_opportunity: 'Boolean Column Indexing Opportunities',
  where_clause_column: 'Columns Used In WHERE Clauses',
  potential_n_plus_one: 'Potential N+1 Queries',
  view_association_access: 'Association Access In Views',
  connection_pool_size: 'Connection Pool Size',
  statement_timeout: 'Statement Timeout',
  connect_timeout: 'Connect Timeout',
  checkout_timeout: 'Checkout Timeout',
  prepared_statements: 'Prepared Statements',
  reaping_frequency: 'Reaping Frequency',
  ssl_configuration: 'SSL Configuration',
  performance_extensions: 'Performance Extensions',
};

/**
 * Format an AnalysisResult as human-readable text.
 */
export function toText(result: AnalysisResult, options?: FormatOptions): string {
  const lines: string[] = [];
  const { metadata, summary } = result;

  lines.push(`=== ${TITLES[result.kind]} ===`);
  lines.push('');

  if (metadata.timestamp !== null) {
    lines.push(`Timestamp: ${metadata.timestamp}`);
  }
  lines.push(`Root:      ${metadata.root}`);
  lines.push(`Files:     ${String(metadata.filesScanned)}`);
  lines.push(
    `Findings:  ${String(metadata.findingCount)} (${String(summary.severityCounts.warning)} warning, ${String(summary.severityCounts.info)} info)`,
  );
  if (result.scanErrors.length > 0) {
    lines.push(`Skipped:   ${String(result.scanErrors.length)} unreadable file(s)`);
  }
  lines.push('');

  if (options?.findingsOnly !== true) {
    lines.push(...describeInputs(result));
  }

  if (summary.groups.length === 0) {
    lines.push('No issues detected.');
    lines.push('');
    return lines.join('\n');
  }

  for (const group of summary.groups) {
    lines.push(`--- ${GROUP_TITLES[group.type]} (${String(group.count)}) ---`);
    for (const finding of group.preview) {
      lines.push(...formatFinding(finding));
    }
    if (group.overflow > 0) {
      lines.push(`  ... and ${String(group.overflow)} more`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

function describeInputs(result: AnalysisResult): string[] {
  const lines: string[] = [];

  switch (result.kind) {
    case 'indexes':
      lines.push(`--- Schema (${String(result.schema.size)} tables) ---`);
      for (const table of result.schema.values()) {
        lines.push(`  Table: ${table.name}`);
        lines.push(`    Columns: ${listOrNone(table.columns)}`);
        lines.push(`    Indexed: ${listOrNone(table.indexes)}`);
      }
      break;
    case 'n-plus-one':
      lines.push(`--- Model Associations (${String(result.associations.length)} models) ---`);
      for (const model of result.associations) {
        lines.push(`  Model: ${model.model} (${model.file})`);
        if (model.belongsTo.length > 0) lines.push(`    belongs_to: ${model.belongsTo.join(', ')}`);
        if (model.hasOne.length > 0) lines.push(`    has_one: ${model.hasOne.join(', ')}`);
        if (model.hasMany.length > 0) lines.push(`    has_many: ${model.hasMany.join(', ')}`);
      }
      break;
    case 'config':
      lines.push(`--- Environments ---`);
      lines.push(`  ${listOrNone(result.environments)}`);
      break;
  }

  lines.push('');
  return lines;
}

function formatFinding(finding: Finding): string[] {
  const lines = [
    `  [${finding.severity.toUpperCase()}] ${formatLocation(finding.location)}`,
    `    ${finding.message}`,
  ];
  if (finding.suggestion !== null) {
    const [first, ...rest] = finding.suggestion.split('\n');
    lines.push(`    Suggestion: ${first ?? ''}`);
    for (const line of rest) {
      lines.push(`      ${line}`);
    }
  }
  return lines;
}

export function formatLocation(location: FindingLocation): string {
  switch (location.kind) {
    case 'schema':
      return `${location.table}.${location.column}`;
    case 'source':
      return `${location.file}:${String(location.line)}`;
    case 'query':
      return `${location.column} (${location.file}:${String(location.line)})`;
    case 'config':
      return `[${location.environment}] ${location.setting}`;
  }
}

function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}
