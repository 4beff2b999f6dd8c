import { describe, it, expect } from 'vitest';
import { aggregateFindings } from '../../src/core/report/aggregate.js';
import { toJson } from '../../src/core/report/toJson.js';
import type { ConfigAnalysisResult, Finding } from '../../src/core/report/reportTypes.js';

function poolFinding(environment: string): Finding {
  return {
    type: 'connection_pool_size',
    severity: 'warning',
    message: `Connection pool size not specified in ${environment}`,
    suggestion: 'Set pool: 5 or higher',
    location: { kind: 'config', environment, setting: 'pool' },
    dedupKey: null,
  };
}

function booleanFinding(column: string): Finding {
  return {
    type: 'boolean_index_opportunity',
    severity: 'info',
    message: `Boolean column ${column} on users might benefit from a partial index`,
    suggestion: null,
    location: { kind: 'schema', table: 'users', column },
    dedupKey: null,
  };
}

function resultWith(findings: readonly Finding[]): ConfigAnalysisResult {
  return {
    kind: 'config',
    environments: ['development', 'production'],
    summary: aggregateFindings(findings),
    scanErrors: [],
    metadata: { root: '/app', timestamp: null, findingCount: findings.length, filesScanned: 1 },
  };
}

describe('toJson', () => {
  it('sorts keys and keeps the full result by default', () => {
    const json = toJson(resultWith([poolFinding('development')]), false);
    expect(json.startsWith('{"environments":["development","production"],"kind":"config","metadata":')).toBe(true);
  });

  it('reports each finding type with its preview and hidden count when findings only', () => {
    const columns = ['is_a', 'is_b', 'is_c', 'is_d', 'is_e', 'is_f', 'is_g'];
    const result = resultWith([poolFinding('development'), ...columns.map(booleanFinding)]);
    const parsed: unknown = JSON.parse(toJson(result, true, { findingsOnly: true }));

    expect(parsed).toEqual({
      groups: [
        {
          type: 'boolean_index_opportunity',
          count: 7,
          counts: { info: 7, warning: 0 },
          shown: columns.slice(0, 5).map(booleanFinding),
          overflow: 2,
        },
        {
          type: 'connection_pool_size',
          count: 1,
          counts: { info: 0, warning: 1 },
          shown: [poolFinding('development')],
          overflow: 0,
        },
      ],
      kind: 'config',
      metadata: { root: '/app', timestamp: null, findingCount: 8, filesScanned: 1 },
      scanErrors: [],
      severityCounts: { warning: 1, info: 7 },
    });
  });
});
