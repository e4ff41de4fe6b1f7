import { Table } from 'typeorm';

export const quoteIdentifier = (identifier: string): string =>
  `"${identifier.replace(/"/g, '""')}"`;

const quoteString = (value: string): string => `'${value.replace(/'/g, "''")}'`;

/**
 * Renders a value read from the database as a SQL literal for the dump
 */
export const formatSqlLiteral = (value: unknown): string => {
  if (value === null || value === undefined) return 'NULL';
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : 'NULL';
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'string') return quoteString(value);
  if (value instanceof Date) return quoteString(value.toISOString());
  if (Buffer.isBuffer(value)) return `'\\x${value.toString('hex')}'`;
  return quoteString(JSON.stringify(value));
};

const columnType = (table: Table, name: string): string => {
  const column = table.findColumnByName(name);
  if (!column) return '';
  return column.length ? `${column.type}(${column.length})` : column.type;
};

export const buildCreateTableStatement = (table: Table): string => {
  const definitions = table.columns.map((column) => {
    const parts = [quoteIdentifier(column.name), columnType(table, column.name)];
    if (!column.isNullable) parts.push('NOT NULL');
    if (column.default !== undefined && column.default !== null) {
      parts.push(`DEFAULT ${String(column.default)}`);
    }
    return parts.filter((part) => part.length > 0).join(' ');
  });

  const primaryKey = table.primaryColumns.map((column) =>
    quoteIdentifier(column.name),
  );
  if (primaryKey.length > 0) {
    definitions.push(`PRIMARY KEY (${primaryKey.join(', ')})`);
  }

  return `CREATE TABLE ${quoteIdentifier(table.name)} (\n  ${definitions.join(',\n  ')}\n);`;
};

export const buildInsertStatement = (
  tableName: string,
  row: Record<string, unknown>,
): string => {
  const columns = Object.keys(row);
  return `INSERT INTO ${quoteIdentifier(tableName)} (${columns
    .map(quoteIdentifier)
    .join(', ')}) VALUES (${columns
    .map((column) => formatSqlLiteral(row[column]))
    .join(', ')});`;
};
