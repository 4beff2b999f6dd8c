import type { Finding } from '../../report/reportTypes.js';
import type { SchemaModel } from '../../railsSchema/types.js';

/**
 * Check that every foreign-key-shaped column (`*_id`) leads some index.
 *
 * Only the first column of each index is known to the schema model, so a
 * column indexed solely as the second member of a composite index is still
 * reported.
 */
export function checkFkIndexes(schema: SchemaModel): readonly Finding[] {
  const findings: Finding[] = [];

  for (const table of schema.values()) {
    for (const column of table.foreignKeys) {
      if (!table.indexes.includes(column)) {
        findings.push({
          type: 'missing_foreign_key_index',
          severity: 'warning',
          message: `Foreign key ${column} on ${table.name} should have an index`,
          suggestion: `add_index :${table.name}, :${column}`,
          location: { kind: 'schema', table: table.name, column },
          dedupKey: null,
        });
      }
    }
  }

  return findings;
}
