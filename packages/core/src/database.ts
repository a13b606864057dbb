import { join } from 'node:path';
import { Kysely, SqliteDialect } from 'kysely';
import Database from 'libsql';

export type LocalDatabaseHandle = InstanceType<typeof Database>;

export const LOCAL_CACHE_FILE_NAME = 'local-cache.db';

export interface DatabasePathOptions {
  /** Path to the SQLite file, or ':memory:' */
  path: string;
}

export interface DatabaseInstanceOptions {
  /** An already opened libsql handle */
  database: LocalDatabaseHandle;
}

export type CreateDatabaseOptions = DatabasePathOptions | DatabaseInstanceOptions;

/**
 * Open (creating if needed) the single store file behind a Kysely instance.
 *
 * Kysely's SQLite driver keeps one connection behind a mutex, so every query
 * and every transaction runs as one unit of work on a single queue.
 *
 * @example
 * const db = createDatabase<LocalCacheDb>({ path: ':memory:' });
 * const db = createDatabase<LocalCacheDb>({
 *   path: localCacheDatabasePath(documentsDir),
 * });
 */
export function createDatabase<T>(options: CreateDatabaseOptions): Kysely<T> {
  const database =
    'database' in options ? options.database : new Database(options.path);
  return new Kysely<T>({
    dialect: new SqliteDialect({ database }),
  });
}

/**
 * Location of the store inside the application's private documents directory.
 */
export function localCacheDatabasePath(documentsDir: string): string {
  return join(documentsDir, LOCAL_CACHE_FILE_NAME);
}
