/**
 * Reflected description of a table, independent of any ORM metadata.
 */
export interface TableSchema {
  name: string;

  /**
   * Column names in declared order
   */
  columns: string[];

  /**
   * Primary-key column names in declared order
   */
  primaryKey: string[];
}

/**
 * A raw row as read from the driver, keyed by column name
 */
export type Row = Record<string, unknown>;
