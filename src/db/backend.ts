/**
 * Raw-SQL port the SQLite state store runs on.
 */

export type SqlParam = string | number | Uint8Array | null;

export interface DatabaseBackend {
  /** Apply SCHEMA_SQL; safe to call on an existing database. */
  initialize(): Promise<void>;

  execute(sql: string, params?: SqlParam[]): Promise<void>;

  /** First matching row, or null. */
  queryOne<T = Record<string, unknown>>(sql: string, params?: SqlParam[]): Promise<T | null>;

  /** Run `fn` atomically; a rejection rolls every statement back. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
