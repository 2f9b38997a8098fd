/**
 * Id-addressed record store on top of a DatabaseBackend.
 */
import type { AuthorityRecord } from "../core/types.js";
import { StorageError } from "../core/exceptions.js";
import type { DatabaseBackend } from "./backend.js";
import { SQLiteBackend } from "./sqlite.js";

export class RecordStore {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  /** Create a new store file with its table and index. */
  static async create(path: string): Promise<RecordStore> {
    let db: SQLiteBackend | null = null;
    try {
      db = new SQLiteBackend(path);
      await db.initialize();
      return new RecordStore(db);
    } catch (err) {
      await db?.close();
      throw new StorageError(`Could not create store at ${path}`, { cause: err });
    }
  }

  /** Open an existing store for lookups only. */
  static open(path: string): RecordStore {
    try {
      return new RecordStore(new SQLiteBackend(path, { readonly: true }));
    } catch (err) {
      throw new StorageError(`Could not open store at ${path}`, { cause: err });
    }
  }

  /**
   * Append every record in one transaction. Nothing is visible unless the
   * whole iterable is consumed; any error rolls the batch back.
   */
  async load(records: AsyncIterable<AuthorityRecord>): Promise<number> {
    let consumed = false;
    try {
      return await this.db.transaction(async () => {
        let count = 0;
        for await (const record of records) {
          await this.insert(record);
          count++;
        }
        consumed = true;
        return count;
      });
    } catch (err) {
      // Source and insert errors pass through; past the last record only COMMIT is left
      if (consumed) throw new StorageError("Could not commit records", { cause: err });
      throw err;
    }
  }

  async lookup(id: string): Promise<string[]> {
    const rows = await this.db.query<{ content: string }>(
      "SELECT content FROM gnd WHERE id = ? ORDER BY rowid",
      [id],
    );
    return rows.map((r) => r.content);
  }

  async count(): Promise<number> {
    const row = await this.db.queryOne<{ n: number }>(
      "SELECT COUNT(*) AS n FROM gnd",
    );
    return row?.n ?? 0;
  }

  async close(): Promise<void> {
    try {
      await this.db.close();
    } catch (err) {
      throw new StorageError("Could not close store", { cause: err });
    }
  }

  private async insert(record: AuthorityRecord): Promise<void> {
    try {
      await this.db.execute("INSERT INTO gnd (id, content) VALUES (?, ?)", [
        record.id,
        record.content,
      ]);
    } catch (err) {
      throw new StorageError(`Could not insert record ${record.id}`, { cause: err });
    }
  }
}
