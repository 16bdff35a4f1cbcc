/**
 * History ledger: path → last delivered version, the dedup and idempotency authority.
 */
import { z } from "zod";
import type { Logger } from "../log.js";
import type { JsonObject, StatePersistence } from "../state/persistence.js";
import { LedgerLoadError } from "./exceptions.js";
import type { FileRecord } from "./types.js";

// ---------------------------------------------------------------------------
// Stored shape (snake_case, as the aggregator reads it)
// ---------------------------------------------------------------------------

const StoredRecordSchema = z.object({
  hash: z.string().min(1),
  last_sent: z.string(),
  send_success: z.boolean().default(true),
  forward_success: z.boolean().nullable().default(null),
  encrypted: z.boolean().default(false),
  encryption_algorithm: z.enum(["None", "AES"]).default("None"),
  file_id: z.number().int().nonnegative(),
  file_size: z.number().nonnegative().default(0),
  processed_size: z.number().nonnegative().optional(),
  processing_time: z.number().default(0),
  upload_speed: z.number().default(0),
  parts: z.number().int().positive().default(1),
});

export type StoredRecord = z.input<typeof StoredRecordSchema>;

export function toStoredRecord(record: FileRecord): StoredRecord {
  return {
    hash: record.hash,
    last_sent: record.lastSentAt,
    send_success: record.deliverySucceeded,
    forward_success: record.forwardSucceeded,
    encrypted: record.encrypted,
    encryption_algorithm: record.encryptionAlgorithm,
    file_id: record.sequenceId,
    file_size: record.originalSize,
    processed_size: record.processedSize,
    processing_time: record.processingTimeMs,
    upload_speed: record.uploadBytesPerSec,
    parts: record.parts,
  };
}

export function decodeHistory(raw: JsonObject, log: Logger): Map<string, FileRecord> {
  const records = new Map<string, FileRecord>();
  for (const [path, value] of Object.entries(raw)) {
    const parsed = StoredRecordSchema.safeParse(value);
    if (!parsed.success) {
      log.warn("dropping unreadable ledger entry", { path, issues: parsed.error.issues.length });
      continue;
    }
    const r = parsed.data;
    records.set(path, {
      hash: r.hash,
      lastSentAt: r.last_sent,
      deliverySucceeded: r.send_success,
      forwardSucceeded: r.forward_success,
      encrypted: r.encrypted,
      encryptionAlgorithm: r.encryption_algorithm,
      sequenceId: r.file_id,
      originalSize: r.file_size,
      processedSize: r.processed_size ?? r.file_size,
      processingTimeMs: r.processing_time,
      uploadBytesPerSec: r.upload_speed,
      parts: r.parts,
    });
  }
  return records;
}

function encodeHistory(records: Map<string, FileRecord>): Record<string, StoredRecord> {
  const out: Record<string, StoredRecord> = {};
  for (const [path, record] of records) {
    out[path] = toStoredRecord(record);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Ledger
// ---------------------------------------------------------------------------

/** A record before the ledger has numbered it. */
export type LedgerEntry = Omit<FileRecord, "sequenceId">;

export class HistoryLedger {
  private records = new Map<string, FileRecord>();

  constructor(
    private persistence: StatePersistence,
    private log: Logger,
  ) {}

  /** Replace in-memory state with what is persisted. */
  async load(): Promise<void> {
    this.records = await this.read();
  }

  get size(): number {
    return this.records.size;
  }

  get(path: string): FileRecord | undefined {
    return this.records.get(path);
  }

  /**
   * True if any path carries `hash`. Identical content under a new name is
   * therefore treated as already delivered.
   */
  lookupByHash(hash: string): boolean {
    for (const record of this.records.values()) {
      if (record.hash === hash) return true;
    }
    return false;
  }

  isStaleOrNew(path: string, hash: string): boolean {
    const record = this.records.get(path);
    return record === undefined || record.hash !== hash;
  }

  nextSequenceId(): number {
    let max = 0;
    for (const record of this.records.values()) {
      if (record.sequenceId > max) max = record.sequenceId;
    }
    return max + 1;
  }

  /**
   * Upsert `entry` under `path` against the stored ledger, not the copy in
   * memory, so a reset since the last load stays in effect. Returns the
   * sequence id assigned. If the save fails, memory holds what is stored.
   */
  async commit(path: string, entry: LedgerEntry): Promise<number> {
    this.records = await this.read();
    const sequenceId = this.nextSequenceId();
    const updated = new Map(this.records).set(path, { ...entry, sequenceId });
    await this.persistence.save("history", encodeHistory(updated));
    this.records = updated;
    return sequenceId;
  }

  /** Ledger in its stored shape, keyed by path. */
  snapshot(): Record<string, StoredRecord> {
    return encodeHistory(this.records);
  }

  clear(): void {
    this.records.clear();
  }

  private async read(): Promise<Map<string, FileRecord>> {
    let raw: JsonObject;
    try {
      raw = await this.persistence.load("history");
    } catch (err) {
      throw new LedgerLoadError(err instanceof Error ? err.message : String(err));
    }
    return decodeHistory(raw, this.log);
  }
}
