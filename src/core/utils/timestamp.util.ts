/**
 * Formats a date the way Ko-fi and the user records store timestamps:
 * ISO 8601 in UTC with second precision, e.g. `2024-09-22T14:03:00Z`.
 */
export const formatTimestamp = (date: Date): string => {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
};

/**
 * Parses an ISO 8601 string into epoch milliseconds, or null when it is not a date
 */
export const parseTimestamp = (value: string): number | null => {
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
};

export const DAY_MS = 24 * 60 * 60 * 1000;

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
