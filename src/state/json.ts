/**
 * State documents as JSON files on a {@link StorageBackend}.
 */
import type { Logger } from "../log.js";
import type { StorageBackend } from "../storage/backend.js";
import {
  STATE_DOCUMENTS,
  parseDocument,
  type JsonObject,
  type StateDocument,
  type StatePersistence,
} from "./persistence.js";

export const STATE_FILE_NAMES: Record<StateDocument, string> = {
  history: "bot_file_history.json",
  sizeCache: "file_size_cache.json",
  pendingErrors: "pending_errors.json",
};

export class JsonStatePersistence implements StatePersistence {
  constructor(
    private storage: StorageBackend,
    private log: Logger,
  ) {}

  async load(doc: StateDocument): Promise<JsonObject> {
    const key = STATE_FILE_NAMES[doc];
    if (!(await this.storage.exists(key))) {
      this.log.warn("state file not found, starting empty", { file: key });
      return {};
    }
    const data = await this.storage.read(key);
    return parseDocument(new TextDecoder().decode(data), doc, this.log);
  }

  async save(doc: StateDocument, data: JsonObject): Promise<void> {
    await this.storage.write(STATE_FILE_NAMES[doc], JSON.stringify(data));
  }

  async clear(): Promise<void> {
    for (const doc of STATE_DOCUMENTS) {
      await this.save(doc, {});
    }
  }
}
