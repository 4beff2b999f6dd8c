import { parse as parsePath } from 'node:path';

/**
 * `create_table "name" ... do |t| ... end`. Blocks never nest in schema.rb,
 * so the first standalone `end` closes the block. Quoted strings are skipped
 * whole, so an `end` inside a comment or default value does not.
 */
const TABLE_BLOCK_PATTERN =
  /create_table\s+["'](\w+)["'][^\n]*?\bdo\s*\|t\|((?:"[^"\n]*"|'[^'\n]*'|[\s\S])*?)\bend\b(?!["'])/g;

/** `t.<type> "<name>"` */
const COLUMN_PATTERN = /\bt\.(\w+)\s+["'](\w+)["']/g;

/** `t.index ["first", ...]`, first column only. */
const INLINE_INDEX_PATTERN = /\bt\.index\s+\[?\s*["':](\w+)/g;

/** `add_index "table", ["first", ...]`, first column only. */
const ADD_INDEX_PATTERN = /add_index\s+["':](\w+)["']?\s*,\s*\[?\s*["':](\w+)/g;

const FOREIGN_KEY_SUFFIX = '_id';

const ASSOCIATION_PATTERN = /\b(has_many|has_one|belongs_to)\s+:(\w+)/g;

/** Raw text of one `create_table` block. */
export interface TableBlock {
  readonly name: string;
  readonly body: string;
}

/** An index statement reduced to its table and leading column. */
export interface IndexDeclaration {
  readonly table: string;
  readonly column: string;
}

/** Association names declared in a model file. */
export interface Associations {
  readonly hasMany: readonly string[];
  readonly hasOne: readonly string[];
  readonly belongsTo: readonly string[];
}

/** Associations of a single model, located by its source file. */
export interface ModelAssociations extends Associations {
  readonly file: string;
  readonly model: string;
}

export function extractTableBlocks(content: string): readonly TableBlock[] {
  const blocks: TableBlock[] = [];
  for (const match of content.matchAll(TABLE_BLOCK_PATTERN)) {
    const name = match[1];
    if (name !== undefined) {
      blocks.push({ name, body: match[2] ?? '' });
    }
  }
  return blocks;
}

/**
 * Column names declared in a table block body, whatever their type.
 * `t.index` lines declare indexes, not columns.
 */
export function extractColumns(body: string): readonly string[] {
  const columns: string[] = [];
  for (const match of body.matchAll(COLUMN_PATTERN)) {
    const type = match[1];
    const name = match[2];
    if (name !== undefined && type !== 'index') {
      columns.push(name);
    }
  }
  return columns;
}

/** Columns named by the `_id` foreign key convention. */
export function extractForeignKeyColumns(columns: readonly string[]): readonly string[] {
  return columns.filter((column) => column.endsWith(FOREIGN_KEY_SUFFIX));
}

/** Leading columns of `t.index` declarations inside a table block body. */
export function extractInlineIndexes(body: string): readonly string[] {
  const columns: string[] = [];
  for (const match of body.matchAll(INLINE_INDEX_PATTERN)) {
    if (match[1] !== undefined) {
      columns.push(match[1]);
    }
  }
  return columns;
}

/** `add_index` statements anywhere in the file. */
export function extractIndexes(content: string): readonly IndexDeclaration[] {
  const indexes: IndexDeclaration[] = [];
  for (const match of content.matchAll(ADD_INDEX_PATTERN)) {
    const table = match[1];
    const column = match[2];
    if (table !== undefined && column !== undefined) {
      indexes.push({ table, column });
    }
  }
  return indexes;
}

export function extractAssociations(content: string): Associations {
  const hasMany: string[] = [];
  const hasOne: string[] = [];
  const belongsTo: string[] = [];
  const byKind: Record<string, string[]> = { has_many: hasMany, has_one: hasOne, belongs_to: belongsTo };

  for (const match of content.matchAll(ASSOCIATION_PATTERN)) {
    const kind = match[1];
    const name = match[2];
    if (kind !== undefined && name !== undefined) {
      byKind[kind]?.push(name);
    }
  }

  return { hasMany, hasOne, belongsTo };
}

/**
 * Association inventory for a model file. Files declaring no association
 * yield nothing.
 */
export function collectAssociations(file: string, content: string): readonly ModelAssociations[] {
  const associations = extractAssociations(content);
  const total = associations.hasMany.length + associations.hasOne.length + associations.belongsTo.length;
  if (total === 0) {
    return [];
  }
  return [{ file, model: parsePath(file).name, ...associations }];
}
