import { Row, TableSchema } from '../models';

/**
 * Read access to a database whose tables are discovered at run time.
 */
export interface SchemaSource {
  /**
   * Lists the user tables with their ordered columns and primary key
   */
  describeTables(): Promise<TableSchema[]>;

  readRows(table: TableSchema): Promise<Row[]>;
}

/**
 * Write access used to apply a merge plan to the live database.
 */
export interface RowSink {
  insertRow(table: TableSchema, row: Row): Promise<void>;

  /**
   * Updates the row whose primary key equals `key` on every key column
   */
  updateRow(table: TableSchema, key: Row, values: Row): Promise<void>;
}

export type PrimaryDatabaseHandle = SchemaSource & RowSink;
