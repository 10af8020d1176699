import { BetterSqlite3ConnectionOptions } from 'typeorm/driver/better-sqlite3/BetterSqlite3ConnectionOptions';
import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { ENTITIES } from '../entities';

export type DatabaseOptions = BetterSqlite3ConnectionOptions | PostgresConnectionOptions;

export const DEFAULT_DATABASE_URL = 'sqlite:./achats_local.db';

// sqlite:./fichier.db, sqlite:///chemin/absolu.db, sqlite::memory:
export function sqliteFileFromUrl(url: string): string {
  const path = url.replace(/^sqlite:(\/\/)?/, '');
  return path === '' ? ':memory:' : path;
}

export function isSqliteUrl(url: string): boolean {
  return url.startsWith('sqlite:');
}

/**
 * Builds the TypeORM options from a single connection string.
 * Without a URL the application runs on an embedded SQLite file;
 * anything else is treated as a PostgreSQL connection string.
 */
export function buildDataSourceOptions(url: string | undefined, synchronize = true): DatabaseOptions {
  const databaseUrl = url?.trim() || DEFAULT_DATABASE_URL;

  if (isSqliteUrl(databaseUrl)) {
    return {
      type: 'better-sqlite3',
      database: sqliteFileFromUrl(databaseUrl),
      entities: ENTITIES,
      synchronize,
    };
  }

  return {
    type: 'postgres',
    url: databaseUrl,
    entities: ENTITIES,
    synchronize,
  };
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}
