export interface MergeSummary {
  tablesMerged: string[];
  tablesSkipped: string[];
  rowsInserted: number;
  rowsUpdated: number;
  cellsUpdated: number;
}

export interface RowUpdate {
  /**
   * Primary-key column values identifying the row
   */
  key: Record<string, unknown>;
  values: Record<string, unknown>;
}

export interface TableMergePlan {
  inserts: Record<string, unknown>[];
  updates: RowUpdate[];
}
