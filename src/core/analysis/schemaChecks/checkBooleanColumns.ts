import type { Finding } from '../../report/reportTypes.js';
import type { SchemaModel } from '../../railsSchema/types.js';

const BOOLEAN_PREFIXES: readonly string[] = ['is_', 'has_'];

const BOOLEAN_NAMES = new Set<string>(['active', 'enabled', 'published', 'deleted']);

/**
 * Suggest partial indexes for boolean-looking columns.
 *
 * Booleans are recognised by name only (`is_*`, `has_*`, or a conventional
 * flag name). A full index on a two-valued column rarely helps; a partial
 * index on `= true` often does.
 */
export function checkBooleanColumns(schema: SchemaModel): readonly Finding[] {
  const findings: Finding[] = [];

  for (const table of schema.values()) {
    for (const column of table.columns) {
      if (isBooleanName(column) && !table.indexes.includes(column)) {
        findings.push({
          type: 'boolean_index_opportunity',
          severity: 'info',
          message: `Boolean column ${column} on ${table.name} might benefit from a partial index`,
          suggestion: `add_index :${table.name}, :${column}, where: "${column} = true"`,
          location: { kind: 'schema', table: table.name, column },
          dedupKey: null,
        });
      }
    }
  }

  return findings;
}

export function isBooleanName(column: string): boolean {
  return BOOLEAN_PREFIXES.some((prefix) => column.startsWith(prefix)) || BOOLEAN_NAMES.has(column);
}
