/** A table block from db/schema.rb. */
export interface Table {
  readonly name: string;
  /** Column names in declaration order. */
  readonly columns: readonly string[];
  /** Columns named like foreign keys (`*_id`). */
  readonly foreignKeys: readonly string[];
  /** First column of every index declared on the table. */
  readonly indexes: readonly string[];
}

/** Tables keyed by name, in the order they were first declared. */
export type SchemaModel = ReadonlyMap<string, Table>;
