/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { DatabaseBackend, SqlParam } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

export class SQLiteBackend implements DatabaseBackend {
  private db: Database.Database;
  private statements = new Map<string, Database.Statement<SqlParam[]>>();

  constructor(path: string = ":memory:", options: { readonly?: boolean } = {}) {
    const readonly = options.readonly ?? false;
    this.db = new Database(path, { readonly, fileMustExist: readonly });
  }

  async initialize(): Promise<void> {
    this.db.exec(SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    // Prepared statements are cached: the loader issues one INSERT per record
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare<SqlParam[]>(sql);
      this.statements.set(sql, stmt);
    }
    stmt.run(...params);
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    return this.db.prepare<SqlParam[], T>(sql).all(...params);
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const row = this.db.prepare<SqlParam[], T>(sql).get(...params);
    return row ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec("BEGIN");
    try {
      const result = await fn();
      this.db.exec("COMMIT");
      return result;
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }

  async close(): Promise<void> {
    this.statements.clear();
    this.db.close();
  }
}
