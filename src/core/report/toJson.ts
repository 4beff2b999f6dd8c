import type { AnalysisResult, Finding, FindingGroup, FormatOptions, Severity } from './reportTypes.js';

/** One finding type as it appears in findings-only JSON. */
interface GroupReport {
  readonly type: FindingGroup['type'];
  readonly count: number;
  readonly counts: Readonly<Record<Severity, number>>;
  readonly shown: readonly Finding[];
  readonly overflow: number;
}

/**
 * Render an AnalysisResult as JSON with sorted keys. Schema and association
 * maps become objects keyed by name.
 *
 * With `findingsOnly` the input model is left out and findings are reported
 * per type: the preview the text report prints, the severity split, and how
 * many entries the preview hides.
 */
export function toJson(result: AnalysisResult, pretty: boolean, options?: FormatOptions): string {
  const data = options?.findingsOnly === true
    ? {
        kind: result.kind,
        metadata: result.metadata,
        scanErrors: result.scanErrors,
        severityCounts: result.summary.severityCounts,
        groups: result.summary.groups.map(toGroupReport),
      }
    : result;
  const sorted = sortKeysDeep(data);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

function toGroupReport(group: FindingGroup): GroupReport {
  return {
    type: group.type,
    count: group.count,
    counts: {
      warning: group.bySeverity.warning.length,
      info: group.bySeverity.info.length,
    },
    shown: group.preview,
    overflow: group.overflow,
  };
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value instanceof Map) {
    return sortKeysDeep(Object.fromEntries(value));
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
