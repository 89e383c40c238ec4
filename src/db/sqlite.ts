import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { DbClient } from './driver.js';

export class SqliteClient implements DbClient {
  readonly dialect = 'sqlite' as const;
  private db: Database.Database;
  private txDepth = 0;

  constructor(readonly dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
  }

  async run(sql: string, params: unknown[] = []): Promise<void> {
    this.db.prepare(sql).run(...params);
  }

  async get<T>(sql: string, params: unknown[] = []): Promise<T | undefined> {
    return this.db.prepare(sql).get(...params) as T | undefined;
  }

  async all<T>(sql: string, params: unknown[] = []): Promise<T[]> {
    return this.db.prepare(sql).all(...params) as T[];
  }

  async exec(sql: string): Promise<void> {
    this.db.exec(sql);
  }

  // Nested calls become savepoints inside the outer BEGIN/COMMIT
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const depth = this.txDepth++;
    const savepoint = `sp_${depth}`;
    this.db.exec(depth === 0 ? 'BEGIN' : `SAVEPOINT ${savepoint}`);
    try {
      const result = await fn();
      this.db.exec(depth === 0 ? 'COMMIT' : `RELEASE ${savepoint}`);
      return result;
    } catch (e) {
      this.db.exec(depth === 0 ? 'ROLLBACK' : `ROLLBACK TO ${savepoint}`);
      throw e;
    } finally {
      this.txDepth = depth;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
