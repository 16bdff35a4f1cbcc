/**
 * Mutable pipeline state: ledger, size cache and pending error notices.
 */
import type { Logger } from "../log.js";
import type { StatePersistence } from "../state/persistence.js";
import { isJsonObject } from "../state/persistence.js";
import type { MessageRef } from "../transport/backend.js";
import { HistoryLedger } from "./ledger.js";

/** Path → byte size, used only to order the work queue. */
export class SizeCache {
  private sizes = new Map<string, number>();

  constructor(
    private persistence: StatePersistence,
    private log: Logger,
  ) {}

  async load(): Promise<void> {
    const raw = await this.persistence.load("sizeCache");
    this.sizes = new Map(
      Object.entries(raw).filter((e): e is [string, number] => typeof e[1] === "number"),
    );
  }

  get(path: string): number | undefined {
    return this.sizes.get(path);
  }

  /** Replace the cache with a fresh measurement and persist it. */
  async rebuild(sizes: Map<string, number>): Promise<void> {
    this.sizes = new Map(sizes);
    await this.persistence.save("sizeCache", Object.fromEntries(this.sizes));
    this.log.debug("file size cache rebuilt", { entries: this.sizes.size });
  }

  clear(): void {
    this.sizes.clear();
  }
}

/** Path → the visible error notice currently standing for it. */
export class PendingErrors {
  private refs = new Map<string, MessageRef>();

  constructor(private persistence: StatePersistence) {}

  async load(): Promise<void> {
    const raw = await this.persistence.load("pendingErrors");
    const refs = new Map<string, MessageRef>();
    for (const [path, value] of Object.entries(raw)) {
      if (!isJsonObject(value)) continue;
      const { chat_id: chatId, message_id: messageId } = value;
      if (typeof chatId === "string" && typeof messageId === "number") {
        refs.set(path, { chatId, messageId });
      }
    }
    this.refs = refs;
  }

  get(path: string): MessageRef | undefined {
    return this.refs.get(path);
  }

  async set(path: string, ref: MessageRef): Promise<void> {
    this.refs.set(path, ref);
    await this.save();
  }

  async delete(path: string): Promise<void> {
    if (!this.refs.delete(path)) return;
    await this.save();
  }

  clear(): void {
    this.refs.clear();
  }

  private async save(): Promise<void> {
    const out: Record<string, { chat_id: string; message_id: number }> = {};
    for (const [path, ref] of this.refs) {
      out[path] = { chat_id: ref.chatId, message_id: ref.messageId };
    }
    await this.persistence.save("pendingErrors", out);
  }
}

export class PipelineState {
  readonly ledger: HistoryLedger;
  readonly sizes: SizeCache;
  readonly pendingErrors: PendingErrors;

  constructor(
    private persistence: StatePersistence,
    log: Logger,
  ) {
    this.ledger = new HistoryLedger(persistence, log);
    this.sizes = new SizeCache(persistence, log);
    this.pendingErrors = new PendingErrors(persistence);
  }

  /**
   * Reload everything from persistence. Called at the start of each cycle so
   * an external reset is picked up; throws LedgerLoadError if the ledger
   * cannot be read.
   */
  async load(): Promise<void> {
    await this.ledger.load();
    await this.sizes.load();
    await this.pendingErrors.load();
  }

  /** Empty every document, persisted and in memory. */
  async reset(): Promise<void> {
    await this.persistence.clear();
    this.ledger.clear();
    this.sizes.clear();
    this.pendingErrors.clear();
  }
}
