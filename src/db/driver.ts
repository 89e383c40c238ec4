import type { Config } from '../config.js';
import { initSchema } from './schema.js';

export type Dialect = 'sqlite' | 'postgres';

/** The async query surface shared by the SQLite and Postgres backends. */
export interface DbClient {
  readonly dialect: Dialect;
  run(sql: string, params?: unknown[]): Promise<void>;
  get<T>(sql: string, params?: unknown[]): Promise<T | undefined>;
  all<T>(sql: string, params?: unknown[]): Promise<T[]>;
  exec(sql: string): Promise<void>;
  transaction<T>(fn: () => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export type DbTarget = Pick<Config, 'dbUrl' | 'dbPath'>;

export function dialectFor(cfg: DbTarget): Dialect {
  return cfg.dbUrl ? 'postgres' : 'sqlite';
}

/** Postgres when HIERVAL_DB_URL is set, otherwise a local SQLite file. */
export async function createDbClient(cfg: DbTarget): Promise<DbClient> {
  if (cfg.dbUrl) {
    const { PgClient } = await import('./postgres.js');
    return PgClient.connect(cfg.dbUrl);
  }
  const { SqliteClient } = await import('./sqlite.js');
  return new SqliteClient(cfg.dbPath);
}

/**
 * Open the embedding cache with its tables in place. The client is closed
 * again if preparing it fails, so callers only own it on success.
 */
export async function openCacheDb(
  cfg: DbTarget,
  prepare: (db: DbClient) => Promise<void> = initSchema,
): Promise<DbClient> {
  const db = await createDbClient(cfg);
  try {
    await prepare(db);
  } catch (err) {
    await db.close();
    throw err;
  }
  return db;
}
