/**
 * How rows that exist on both sides are merged.
 */
export enum MergeMode {
  /**
   * Uploaded data wins whenever it has a value that differs
   */
  RECOVER = 'recover',

  /**
   * Uploaded data only fills cells that are null in the live database
   */
  IMPORT = 'import',
}
