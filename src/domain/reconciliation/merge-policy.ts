import { MergeMode } from './models';

export const isNullish = (value: unknown): value is null | undefined =>
  value === null || value === undefined;

const toInstant = (value: unknown): number => {
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'string' || typeof value === 'number') {
    return new Date(value).getTime();
  }
  return Number.NaN;
};

const toBooleanNumber = (value: unknown): number => {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number') return value;
  return Number.NaN;
};

const isNumeric = (value: unknown): value is number | bigint =>
  typeof value === 'number' || typeof value === 'bigint';

const toNumber = (value: unknown): number => {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
};

/**
 * Cell equality across drivers: SQLite hands back booleans as 0/1, Postgres
 * hands back Date and parsed JSON values, blobs arrive as Buffers. A number
 * equals its decimal text, the same way primary keys collapse in `rowKey`.
 */
export const valuesEqual = (a: unknown, b: unknown): boolean => {
  if (isNullish(a) || isNullish(b)) {
    return isNullish(a) && isNullish(b);
  }

  if (Buffer.isBuffer(a) || Buffer.isBuffer(b)) {
    return Buffer.isBuffer(a) && Buffer.isBuffer(b) && a.equals(b);
  }

  if (a instanceof Date || b instanceof Date) {
    const left = toInstant(a);
    return !Number.isNaN(left) && left === toInstant(b);
  }

  if (typeof a === 'boolean' || typeof b === 'boolean') {
    return toBooleanNumber(a) === toBooleanNumber(b);
  }

  if (isNumeric(a) || isNumeric(b)) {
    if (String(a) === String(b)) return true;
    const left = toNumber(a);
    return !Number.isNaN(left) && left === toNumber(b);
  }

  if (typeof a === 'object' && typeof b === 'object') {
    return JSON.stringify(a) === JSON.stringify(b);
  }

  return a === b;
};

const assertNever = (mode: never): never => {
  throw new Error(`Unsupported merge mode: ${String(mode)}`);
};

/**
 * Decides whether the live cell takes the uploaded value.
 */
export const shouldOverwrite = (
  mode: MergeMode,
  current: unknown,
  incoming: unknown,
): boolean => {
  if (isNullish(incoming)) {
    return false;
  }

  switch (mode) {
    case MergeMode.RECOVER:
      return !valuesEqual(current, incoming);
    case MergeMode.IMPORT:
      return isNullish(current);
    default:
      return assertNever(mode);
  }
};

const keyPart = (value: unknown): string | null => {
  if (isNullish(value)) return null;
  if (Buffer.isBuffer(value)) return `hex:${value.toString('hex')}`;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

/**
 * Serializes the ordered primary-key tuple of a row into a map key.
 * Numbers and numeric strings collapse so that a Postgres bigint ('42')
 * matches the SQLite integer 42.
 */
export const rowKey = (
  row: Record<string, unknown>,
  primaryKey: string[],
): string => {
  return JSON.stringify(primaryKey.map((column) => keyPart(row[column])));
};
