export type DatabaseTarget =
  | { type: 'better-sqlite3'; database: string }
  | { type: 'postgres'; url: string };

const POSTGRES_URL = /^postgres(?:ql)?(?:\+[a-z0-9]+)?:\/\//i;
const SQLITE_PREFIX = /^sqlite:(?:\/\/\/)?/i;

/**
 * Resolves DATABASE_URL into a TypeORM driver target.
 *
 * Accepts `postgres://` / `postgresql://` URLs (a `+driver` suffix such as
 * `postgresql+psycopg2://` is dropped), `sqlite:<path>`, `sqlite:///<path>`
 * and bare file paths, which are treated as SQLite.
 */
export const parseDatabaseUrl = (url: string): DatabaseTarget => {
  const trimmed = url.trim();
  if (!trimmed) {
    throw new Error('DATABASE_URL is empty');
  }

  if (POSTGRES_URL.test(trimmed)) {
    return {
      type: 'postgres',
      url: trimmed.replace(/^postgres(?:ql)?\+[a-z0-9]+:/i, 'postgresql:'),
    };
  }

  const database = trimmed.replace(SQLITE_PREFIX, '');
  if (!database) {
    throw new Error(`DATABASE_URL "${url}" does not name a SQLite file`);
  }

  return { type: 'better-sqlite3', database };
};
