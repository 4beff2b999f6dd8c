import type { Finding } from '../../report/reportTypes.js';

/** Globs (relative to the project root) scanned for controller actions. */
export const CONTROLLER_GLOBS: readonly string[] = ['app/controllers/**/*.rb'];

/** Lines before a fetch searched for eager loading. */
export const EAGER_LOAD_LINES_BEFORE = 2;

/** Lines after a fetch searched for eager loading. */
export const EAGER_LOAD_LINES_AFTER = 2;

/** Lines after a fetch searched for per-record association access. */
export const ASSOCIATION_LOOKAHEAD_LINES = 20;

const FETCH_PATTERN = /\.(all|where|find_by|find)\b/;
const EAGER_LOAD_PATTERN = /\.(includes|preload|eager_load)\b/;
const INSTANCE_ASSIGNMENT_PATTERN = /@(\w+)\s*=/;

/**
 * Flag controller queries that look like the first half of an N+1.
 *
 * A line is reported when it fetches records, no eager loading appears in
 * the surrounding window, the result is assigned to an instance variable,
 * and that variable has a two-level member chain (`@posts.author.name`)
 * within the lookahead window.
 */
export function checkControllerQueries(file: string, content: string): readonly Finding[] {
  const findings: Finding[] = [];
  const lines = content.split('\n');

  lines.forEach((line, index) => {
    if (!FETCH_PATTERN.test(line)) return;

    const context = lines
      .slice(Math.max(0, index - EAGER_LOAD_LINES_BEFORE), index + EAGER_LOAD_LINES_AFTER + 1)
      .join('\n');
    if (EAGER_LOAD_PATTERN.test(context)) return;

    const variable = INSTANCE_ASSIGNMENT_PATTERN.exec(line)?.[1];
    if (variable === undefined) return;

    const chain = new RegExp(`@${variable}\\.\\w+\\.\\w+`);
    const following = lines.slice(index + 1, index + 1 + ASSOCIATION_LOOKAHEAD_LINES);
    if (following.some((candidate) => chain.test(candidate))) {
      const lineNumber = index + 1;
      findings.push({
        type: 'potential_n_plus_one',
        severity: 'warning',
        message: `Potential N+1 query: Query at line ${String(lineNumber)} may need eager loading`,
        suggestion: `Eager load the associations read through @${variable}, e.g. .includes(:association)`,
        location: { kind: 'source', file, line: lineNumber },
        dedupKey: null,
      });
    }
  });

  return findings;
}
