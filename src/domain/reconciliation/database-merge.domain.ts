import { Injectable } from '@nestjs/common';
import { logger } from '../../core/logger/logger.config';
import { PrimaryDatabaseHandle, SchemaSource } from './interfaces';
import { isNullish, rowKey, shouldOverwrite } from './merge-policy';
import {
  MergeMode,
  MergeSummary,
  Row,
  RowUpdate,
  TableMergePlan,
  TableSchema,
} from './models';
import {
  MalformedDatabaseError,
  MergeFailedError,
  ReconciliationError,
} from './reconciliation.errors';

/**
 * Merges an uploaded database into the live one, table by table, keyed by
 * primary key. Never deletes: rows and cells that only exist in the live
 * database are left alone in both modes.
 *
 * Transactions and connection lifetimes belong to the caller.
 */
@Injectable()
export class DatabaseMergeDomain {
  private readonly logger = logger('reconciliation');

  async merge(
    primary: PrimaryDatabaseHandle,
    secondary: SchemaSource,
    mode: MergeMode,
  ): Promise<MergeSummary> {
    let secondaryTables: TableSchema[];
    try {
      secondaryTables = await secondary.describeTables();
    } catch (error) {
      throw new MalformedDatabaseError(error);
    }

    let primaryTables: TableSchema[];
    try {
      primaryTables = await primary.describeTables();
    } catch (error) {
      throw new MergeFailedError(null, error);
    }

    const secondaryByName = new Map(
      secondaryTables.map((table) => [table.name, table]),
    );
    if (!primaryTables.some((table) => secondaryByName.has(table.name))) {
      throw new MalformedDatabaseError(
        new Error('it has no table in common with the live database'),
      );
    }

    const summary: MergeSummary = {
      tablesMerged: [],
      tablesSkipped: [],
      rowsInserted: 0,
      rowsUpdated: 0,
      cellsUpdated: 0,
    };

    for (const table of primaryTables) {
      const counterpart = secondaryByName.get(table.name);
      if (!counterpart) {
        summary.tablesSkipped.push(table.name);
        continue;
      }

      if (table.primaryKey.length === 0) {
        this.logger.warn(
          { table: table.name },
          'Table has no primary key, skipping merge',
        );
        summary.tablesSkipped.push(table.name);
        continue;
      }

      try {
        const primaryRows = await primary.readRows(table);
        const secondaryRows = await secondary.readRows(counterpart);
        const plan = this.planTable(
          table,
          counterpart,
          primaryRows,
          secondaryRows,
          mode,
        );

        for (const row of plan.inserts) {
          await primary.insertRow(table, row);
        }
        for (const update of plan.updates) {
          await primary.updateRow(table, update.key, update.values);
        }

        summary.tablesMerged.push(table.name);
        summary.rowsInserted += plan.inserts.length;
        summary.rowsUpdated += plan.updates.length;
        summary.cellsUpdated += plan.updates.reduce(
          (total, update) => total + Object.keys(update.values).length,
          0,
        );

        this.logger.debug(
          {
            table: table.name,
            inserted: plan.inserts.length,
            updated: plan.updates.length,
          },
          'Table merged',
        );
      } catch (error) {
        if (error instanceof ReconciliationError) throw error;
        throw new MergeFailedError(table.name, error);
      }
    }

    return summary;
  }

  /**
   * Computes the inserts and updates for one table without touching storage.
   * Only columns present on both sides are compared or copied.
   */
  planTable(
    primary: TableSchema,
    secondary: TableSchema,
    primaryRows: Row[],
    secondaryRows: Row[],
    mode: MergeMode,
  ): TableMergePlan {
    const secondaryColumns = new Set(secondary.columns);
    const missingKeyColumns = primary.primaryKey.filter(
      (column) => !secondaryColumns.has(column),
    );
    if (missingKeyColumns.length > 0) {
      throw new Error(
        `Uploaded table lacks primary key column(s): ${missingKeyColumns.join(', ')}`,
      );
    }

    const keyColumns = new Set(primary.primaryKey);
    const sharedColumns = primary.columns.filter((column) =>
      secondaryColumns.has(column),
    );
    const comparableColumns = sharedColumns.filter(
      (column) => !keyColumns.has(column),
    );

    const existing = new Map<string, Row>();
    for (const row of primaryRows) {
      existing.set(rowKey(row, primary.primaryKey), row);
    }

    const plan: TableMergePlan = { inserts: [], updates: [] };

    for (const incoming of secondaryRows) {
      const key = rowKey(incoming, primary.primaryKey);
      const current = existing.get(key);

      if (!current) {
        const inserted: Row = {};
        for (const column of sharedColumns) {
          inserted[column] = isNullish(incoming[column])
            ? null
            : incoming[column];
        }
        plan.inserts.push(inserted);
        // Later duplicates of the same key in the upload merge into this row
        existing.set(key, inserted);
        continue;
      }

      const values: Row = {};
      for (const column of comparableColumns) {
        if (shouldOverwrite(mode, current[column], incoming[column])) {
          values[column] = incoming[column];
        }
      }

      if (Object.keys(values).length > 0) {
        const update: RowUpdate = {
          key: Object.fromEntries(
            primary.primaryKey.map((column) => [column, current[column]]),
          ),
          values,
        };
        plan.updates.push(update);
      }
    }

    return plan;
  }
}
