import { readFile } from 'node:fs/promises';
import {
  extractColumns,
  extractForeignKeyColumns,
  extractIndexes,
  extractInlineIndexes,
  extractTableBlocks,
} from './extract.js';
import type { SchemaModel, Table } from './types.js';
import { MalformedSchemaError } from '../../util/errors.js';

/**
 * Read db/schema.rb and build its schema model.
 * Only a failed read throws; unrecognised schema text is ignored.
 */
export async function parseSchemaFile(schemaPath: string): Promise<SchemaModel> {
  let content: string;
  try {
    content = await readFile(schemaPath, 'utf-8');
  } catch (error: unknown) {
    throw new MalformedSchemaError(schemaPath, error);
  }
  return buildSchemaModel(content);
}

/**
 * Build a schema model from schema.rb text.
 *
 * Tables come from `create_table` blocks. A table declared twice keeps the
 * columns of its last block. `add_index` statements are merged in afterwards;
 * those naming a table without a block are dropped.
 */
export function buildSchemaModel(content: string): SchemaModel {
  const tables = new Map<string, Table>();

  for (const block of extractTableBlocks(content)) {
    const columns = extractColumns(block.body);
    // Map.set on a known name keeps its first position.
    tables.set(block.name, {
      name: block.name,
      columns,
      foreignKeys: extractForeignKeyColumns(columns),
      indexes: extractInlineIndexes(block.body),
    });
  }

  for (const index of extractIndexes(content)) {
    const table = tables.get(index.table);
    if (table !== undefined) {
      tables.set(index.table, { ...table, indexes: [...table.indexes, index.column] });
    }
  }

  return tables;
}
