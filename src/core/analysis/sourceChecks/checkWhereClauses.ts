import { parse as parsePath } from 'node:path';
import type { Finding } from '../../report/reportTypes.js';
import { lineNumberAt } from '../../../util/index.js';

/** Globs (relative to the project root) scanned for `.where` calls. */
export const WHERE_CLAUSE_GLOBS: readonly string[] = ['app/models/**/*.rb', 'app/controllers/**/*.rb'];

const WHERE_PATTERNS: readonly RegExp[] = [
  // .where(status: 'active')
  /\.where\(\s*(\w+):\s*/g,
  // .where("status = ?")
  /\.where\(["'](\w+)\s*=/g,
];

/**
 * Report columns filtered on by `.where` calls in a model or controller.
 *
 * One finding per column per file, at the first call site. The dedup key is
 * `<file stem>:<column>`, so the aggregator also collapses same-named files.
 */
export function checkWhereClauses(file: string, content: string): readonly Finding[] {
  const stem = parsePath(file).name;
  const firstUse = new Map<string, number>();

  for (const pattern of WHERE_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      const column = match[1];
      if (column === undefined) continue;
      const offset = match.index ?? 0;
      const previous = firstUse.get(column);
      if (previous === undefined || offset < previous) {
        firstUse.set(column, offset);
      }
    }
  }

  return [...firstUse.entries()]
    .sort(([, a], [, b]) => a - b)
    .map(([column, offset]): Finding => ({
      type: 'where_clause_column',
      severity: 'info',
      message: `Column "${column}" used in WHERE clause - consider indexing if queries are slow`,
      suggestion: null,
      location: { kind: 'query', file, line: lineNumberAt(content, offset), column },
      dedupKey: `${stem}:${column}`,
    }));
}
