/**
 * SQLite database backend on sql.js. The database runs in memory and, when
 * opened on a file, is written back after every change outside a transaction.
 */
import { basename, dirname } from "node:path";
import type { Database } from "sql.js";
import { DiskStorage } from "../storage/disk.js";
import type { DatabaseBackend, SqlParam } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

export const IN_MEMORY = ":memory:";

interface DatabaseFile {
  storage: DiskStorage;
  key: string;
}

export class SQLiteBackend implements DatabaseBackend {
  private inTransaction = false;

  private constructor(
    private db: Database,
    private file: DatabaseFile | null,
  ) {}

  /** Open `path`, creating it on the first write; `:memory:` is never saved. */
  static async open(path: string = IN_MEMORY): Promise<SQLiteBackend> {
    const initSqlJs = (await import("sql.js")).default;
    const SQL = await initSqlJs();
    if (path === IN_MEMORY) return new SQLiteBackend(new SQL.Database(), null);

    const file = { storage: new DiskStorage(dirname(path)), key: basename(path) };
    const data = (await file.storage.exists(file.key)) ? await file.storage.read(file.key) : undefined;
    return new SQLiteBackend(new SQL.Database(data), file);
  }

  async initialize(): Promise<void> {
    this.db.exec(SCHEMA_SQL);
    await this.flush();
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    this.db.run(sql, params);
    await this.flush();
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      return stmt.step() ? (stmt.getAsObject() as T) : null;
    } finally {
      stmt.free();
    }
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.inTransaction) return fn();
    this.db.run("BEGIN");
    this.inTransaction = true;
    let result: T;
    try {
      result = await fn();
      this.db.run("COMMIT");
    } catch (err) {
      this.db.run("ROLLBACK");
      throw err;
    } finally {
      this.inTransaction = false;
    }
    await this.flush();
    return result;
  }

  async close(): Promise<void> {
    await this.flush();
    this.db.close();
  }

  private async flush(): Promise<void> {
    if (!this.file || this.inTransaction) return;
    await this.file.storage.write(this.file.key, this.db.export());
  }
}
