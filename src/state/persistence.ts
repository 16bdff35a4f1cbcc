/**
 * Persistence port for pipeline state documents.
 */
import type { Logger } from "../log.js";

export type StateDocument = "history" | "sizeCache" | "pendingErrors";

export const STATE_DOCUMENTS: readonly StateDocument[] = ["history", "sizeCache", "pendingErrors"];

export type JsonObject = Record<string, unknown>;

export interface StatePersistence {
  /** Stored object for `doc`; `{}` when it is missing or unreadable as JSON. */
  load(doc: StateDocument): Promise<JsonObject>;

  /** Replace `doc`; durable once the promise resolves. */
  save(doc: StateDocument, data: JsonObject): Promise<void>;

  /** Replace every document with `{}`. */
  clear(): Promise<void>;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

/** Parse a stored document, degrading to `{}` with a warning. */
export function parseDocument(text: string, doc: StateDocument, log: Logger): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    log.warn("state document is not valid JSON, starting empty", { doc, error: String(err) });
    return {};
  }
  if (!isJsonObject(parsed)) {
    log.warn("state document is not a JSON object, starting empty", { doc });
    return {};
  }
  return parsed;
}
