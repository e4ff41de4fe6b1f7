import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { DatabaseTarget } from './database-url';
import { KofiTransaction, KofiUser } from './entities';
import { InitialSchema1727049600000 } from './migrations/1727049600000-initial-schema';

export const MIGRATIONS_TABLE = 'migrations';

export const ENTITIES = [KofiTransaction, KofiUser];

export const buildDatabaseOptions = (
  target: DatabaseTarget,
): TypeOrmModuleOptions => {
  const shared = {
    entities: ENTITIES,
    migrations: [InitialSchema1727049600000],
    migrationsRun: true,
    migrationsTableName: MIGRATIONS_TABLE,
    synchronize: false,
  };

  if (target.type === 'postgres') {
    return { type: 'postgres', url: target.url, ...shared };
  }

  return { type: 'better-sqlite3', database: target.database, ...shared };
};
