import { QueryRunner } from 'typeorm';
import { PrimaryDatabaseHandle } from '../../../domain/reconciliation/interfaces';
import { Row, TableSchema } from '../../../domain/reconciliation/models';

const isRow = (value: unknown): value is Row =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Exposes a TypeORM connection as a reflected schema plus raw rows.
 * All statements go through the given QueryRunner, so they share its
 * transaction.
 */
export class TypeOrmDatabaseHandle implements PrimaryDatabaseHandle {
  private readonly excluded: Set<string>;

  constructor(
    private readonly queryRunner: QueryRunner,
    excludedTables: string[] = [],
  ) {
    this.excluded = new Set(excludedTables);
  }

  async describeTables(): Promise<TableSchema[]> {
    const tables = await this.queryRunner.getTables();

    return tables
      .filter((table) => !this.isInternalTable(table.name))
      .map((table) => ({
        name: table.name,
        columns: table.columns.map((column) => column.name),
        primaryKey: table.primaryColumns.map((column) => column.name),
      }));
  }

  async readRows(table: TableSchema): Promise<Row[]> {
    const result: unknown = await this.queryRunner.query(
      `SELECT * FROM ${this.escapeTable(table.name)}`,
    );

    if (!Array.isArray(result)) {
      throw new Error(`Unexpected result reading table "${table.name}"`);
    }

    return result.filter(isRow);
  }

  async insertRow(table: TableSchema, row: Row): Promise<void> {
    const columns = Object.keys(row);
    const parameters = Object.fromEntries(
      columns.map((column, index) => [`v${index}`, this.toBindable(row[column])]),
    );

    await this.execute(
      `INSERT INTO ${this.escapeTable(table.name)} (${columns
        .map((column) => this.escape(column))
        .join(', ')}) VALUES (${columns.map((_, index) => `:v${index}`).join(', ')})`,
      parameters,
    );
  }

  async updateRow(table: TableSchema, key: Row, values: Row): Promise<void> {
    const columns = Object.keys(values);
    const parameters: Row = {};

    const assignments = columns.map((column, index) => {
      parameters[`v${index}`] = this.toBindable(values[column]);
      return `${this.escape(column)} = :v${index}`;
    });
    const conditions = table.primaryKey.map((column, index) => {
      parameters[`pk${index}`] = this.toBindable(key[column]);
      return `${this.escape(column)} = :pk${index}`;
    });

    await this.execute(
      `UPDATE ${this.escapeTable(table.name)} SET ${assignments.join(', ')} WHERE ${conditions.join(' AND ')}`,
      parameters,
    );
  }

  /**
   * Runs a statement written with `:name` placeholders; the driver rewrites
   * them into its native form (`?` for SQLite, `$1` for Postgres).
   */
  private async execute(sql: string, parameters: Row): Promise<void> {
    const [query, bound] =
      this.queryRunner.connection.driver.escapeQueryWithParameters(
        sql,
        parameters,
        {},
      );
    await this.queryRunner.query(query, bound);
  }

  private isInternalTable(name: string): boolean {
    return (
      name.startsWith('sqlite_') ||
      name === 'typeorm_metadata' ||
      this.excluded.has(name)
    );
  }

  private escape(identifier: string): string {
    return this.queryRunner.connection.driver.escape(identifier);
  }

  private escapeTable(name: string): string {
    return name
      .split('.')
      .map((part) => this.escape(part))
      .join('.');
  }

  private isSqlite(): boolean {
    const type = this.queryRunner.connection.options.type;
    return type === 'better-sqlite3' || type === 'sqlite';
  }

  /**
   * SQLite only binds numbers, strings, bigints, buffers and null; values read
   * from another driver are flattened to those before writing.
   */
  private toBindable(value: unknown): unknown {
    if (!this.isSqlite()) return value;
    if (typeof value === 'boolean') return value ? 1 : 0;
    if (value instanceof Date) return value.toISOString();
    if (
      typeof value === 'object' &&
      value !== null &&
      !Buffer.isBuffer(value)
    ) {
      return JSON.stringify(value);
    }
    return value;
  }
}
