import { FINDING_TYPES } from './reportTypes.js';
import type { Finding, FindingGroup, FindingSummary, FindingType, Severity } from './reportTypes.js';
import { sortBy } from '../../util/index.js';

/**
 * Itemised entries shown per group. Types not listed are shown in full.
 * Counts are never truncated, only the preview.
 */
export const PREVIEW_LIMITS: Readonly<Partial<Record<FindingType, number>>> = {
  boolean_index_opportunity: 5,
  where_clause_column: 10,
};

/**
 * Deduplicate findings and group them by type, then severity.
 *
 * Findings with a dedup key are kept only on the first occurrence of that key.
 * Groups follow the FINDING_TYPES order; empty groups are omitted.
 */
export function aggregateFindings(all: readonly Finding[]): FindingSummary {
  const findings = dedupe(all);

  const groups: FindingGroup[] = [];
  for (const type of FINDING_TYPES) {
    const ofType = findings.filter((f) => f.type === type);
    if (ofType.length > 0) {
      groups.push(buildGroup(type, ofType));
    }
  }

  return {
    findings,
    groups,
    severityCounts: {
      warning: findings.filter((f) => f.severity === 'warning').length,
      info: findings.filter((f) => f.severity === 'info').length,
    },
  };
}

function dedupe(findings: readonly Finding[]): readonly Finding[] {
  const seen = new Set<string>();
  return findings.filter((f) => {
    if (f.dedupKey === null) return true;
    if (seen.has(f.dedupKey)) return false;
    seen.add(f.dedupKey);
    return true;
  });
}

function buildGroup(type: FindingType, findings: readonly Finding[]): FindingGroup {
  const bySeverity: Record<Severity, readonly Finding[]> = {
    warning: findings.filter((f) => f.severity === 'warning'),
    info: findings.filter((f) => f.severity === 'info'),
  };

  const entries = type === 'where_clause_column' ? uniqueColumns(findings) : findings;
  const limit = PREVIEW_LIMITS[type];
  const preview = limit === undefined ? entries : entries.slice(0, limit);

  return {
    type,
    count: findings.length,
    bySeverity,
    preview,
    overflow: entries.length - preview.length,
  };
}

/** First finding per filtered column, ordered by column name. */
function uniqueColumns(findings: readonly Finding[]): readonly Finding[] {
  const byColumn = new Map<string, Finding>();
  for (const finding of findings) {
    if (finding.location.kind === 'query' && !byColumn.has(finding.location.column)) {
      byColumn.set(finding.location.column, finding);
    }
  }
  return sortBy([...byColumn.entries()], ([column]) => column).map(([, finding]) => finding);
}
