/**
 * State documents as rows of the `state_documents` table.
 */
import type { DatabaseBackend } from "../db/backend.js";
import type { Logger } from "../log.js";
import {
  STATE_DOCUMENTS,
  parseDocument,
  type JsonObject,
  type StateDocument,
  type StatePersistence,
} from "./persistence.js";

export class SqliteStatePersistence implements StatePersistence {
  constructor(
    private db: DatabaseBackend,
    private log: Logger,
  ) {}

  async load(doc: StateDocument): Promise<JsonObject> {
    const row = await this.db.queryOne<{ body: string }>(
      `SELECT body FROM state_documents WHERE name = ?`,
      [doc],
    );
    if (!row) return {};
    return parseDocument(row.body, doc, this.log);
  }

  async save(doc: StateDocument, data: JsonObject): Promise<void> {
    await this.db.execute(
      `INSERT INTO state_documents (name, body, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(name) DO UPDATE SET body = excluded.body, updated_at = excluded.updated_at`,
      [doc, JSON.stringify(data), new Date().toISOString()],
    );
  }

  async clear(): Promise<void> {
    await this.db.transaction(async () => {
      for (const doc of STATE_DOCUMENTS) {
        await this.save(doc, {});
      }
    });
  }
}
