import type { Finding } from '../../report/reportTypes.js';

/** Globs (relative to the project root) scanned as view templates. */
export const VIEW_GLOBS: readonly string[] = ['app/views/**/*.erb', 'app/views/**/*.haml'];

/** `object.association.method` */
const ASSOCIATION_CHAIN_PATTERN = /(\w+)\.(\w+)\.(\w+)/;

/**
 * One low-confidence finding per template line that walks an association,
 * as a prompt to check the controller eager loads it.
 */
export function checkViewAssociations(file: string, content: string): readonly Finding[] {
  const findings: Finding[] = [];

  content.split('\n').forEach((line, index) => {
    const chain = ASSOCIATION_CHAIN_PATTERN.exec(line)?.[0];
    if (chain !== undefined) {
      findings.push({
        type: 'view_association_access',
        severity: 'info',
        message: `Association access in view (${chain}) - verify eager loading in controller`,
        suggestion: null,
        location: { kind: 'source', file, line: index + 1 },
        dedupKey: null,
      });
    }
  });

  return findings;
}
