import { KofiTransaction } from '../../core/database/entities';

export enum TotalMethod {
  TOTAL = 'total',
  RECENT = 'recent',
  LATEST = 'latest',
}

const METHODS: readonly string[] = Object.values(TotalMethod);

const isTotalMethod = (value: string): value is TotalMethod =>
  METHODS.includes(value);

/**
 * Case-insensitive; returns null for anything but total, recent or latest
 */
export const parseTotalMethod = (raw: string): TotalMethod | null => {
  const method = raw.toLowerCase();
  return isTotalMethod(method) ? method : null;
};

/**
 * Sums amounts per currency. Amounts Ko-fi sent in a form that does not parse
 * as a number are left out.
 */
export const sumByCurrency = (
  transactions: Pick<KofiTransaction, 'amount' | 'currency'>[],
): Map<string, number> => {
  const sums = new Map<string, number>();
  for (const { amount, currency } of transactions) {
    const value = amount.trim() === '' ? Number.NaN : Number(amount);
    if (!Number.isFinite(value)) continue;
    sums.set(currency, (sums.get(currency) ?? 0) + value);
  }
  return sums;
};

export const selectLatest = <T extends Pick<KofiTransaction, 'timestamp'>>(
  transactions: T[],
): T | null =>
  transactions.reduce<T | null>(
    (latest, candidate) =>
      latest === null || candidate.timestamp > latest.timestamp
        ? candidate
        : latest,
    null,
  );
