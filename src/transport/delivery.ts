/**
 * Rate-limited, retrying delivery on top of a {@link TransportBackend}.
 */
import type { PendingErrors } from "../core/state.js";
import type { Clock } from "../core/types.js";
import type { Logger } from "../log.js";
import type {
  DocumentUpload,
  MembershipStatus,
  MessageRef,
  ParseMode,
  TransportBackend,
  TransportResult,
} from "./backend.js";
import type { QuotaPool } from "./ratelimit.js";

export type DeliveryOutcome =
  | { ok: true; ref: MessageRef; forwarded: boolean | null }
  | { ok: false; reason: string };

export interface DeliveryOptions {
  backend: TransportBackend;
  chatId: string;
  /** Secondary destination; forwarding is off when null. */
  forwardChatId?: string | null;
  pools: { control: QuotaPool; media: QuotaPool };
  pendingErrors: PendingErrors;
  clock: Clock;
  log: Logger;
  maxAttempts?: number;
  retryDelayMs?: number;
}

export class RateLimitedTransport {
  private readonly backend: TransportBackend;
  private readonly chatId: string;
  private readonly forwardChatId: string | null;
  private readonly control: QuotaPool;
  private readonly media: QuotaPool;
  private readonly pendingErrors: PendingErrors;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private selfId: number | null = null;

  constructor(opts: DeliveryOptions) {
    this.backend = opts.backend;
    this.chatId = opts.chatId;
    this.forwardChatId = opts.forwardChatId ?? null;
    this.control = opts.pools.control;
    this.media = opts.pools.media;
    this.pendingErrors = opts.pendingErrors;
    this.clock = opts.clock;
    this.log = opts.log;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 5_000;
  }

  /**
   * Deliver one document unit for `itemPath`. Exhausting the retries posts a
   * visible error notice for the path, once.
   */
  async sendDocument(
    itemPath: string,
    document: DocumentUpload,
    caption: string,
  ): Promise<DeliveryOutcome> {
    const result = await this.withRetry(this.media, "sendDocument", this.maxAttempts, () =>
      this.backend.sendDocument(this.chatId, document, caption, "MarkdownV2"),
    );
    if (result.kind !== "success") {
      this.log.error("document delivery failed", { path: itemPath, file: document.filename, reason: result.reason });
      await this.postErrorNotice(itemPath);
      return { ok: false, reason: result.reason };
    }
    this.log.info("document sent", { file: document.filename, message_id: result.value.messageId });
    const forwarded = await this.forward(result.value);
    return { ok: true, ref: result.value, forwarded };
  }

  /** Send `text` to the primary chat and, when forwarding is on, to the secondary chat. */
  async broadcastMessage(text: string, parseMode?: ParseMode): Promise<DeliveryOutcome> {
    const result = await this.withRetry(this.control, "sendMessage", this.maxAttempts, () =>
      this.backend.sendMessage(this.chatId, text, parseMode),
    );
    if (result.kind !== "success") {
      return { ok: false, reason: result.reason };
    }

    let forwarded: boolean | null = null;
    const target = this.forwardChatId;
    if (target) {
      const copy = await this.withRetry(this.control, "sendMessage", 1, () =>
        this.backend.sendMessage(target, text, parseMode),
      );
      forwarded = copy.kind === "success";
      if (copy.kind !== "success") {
        this.log.warn("message copy to forward chat failed", { chat: target, reason: copy.reason });
      }
    }
    return { ok: true, ref: result.value, forwarded };
  }

  /** Delete the standing error notice for `itemPath`, if any. */
  async retractErrorNotice(itemPath: string): Promise<void> {
    const ref = this.pendingErrors.get(itemPath);
    if (!ref) return;
    const result = await this.withRetry(this.control, "deleteMessage", this.maxAttempts, () =>
      this.backend.deleteMessage(ref),
    );
    if (result.kind === "success") {
      this.log.info("error notice retracted", { path: itemPath, message_id: ref.messageId });
    } else {
      this.log.warn("error notice could not be deleted", { path: itemPath, reason: result.reason });
    }
    await this.pendingErrors.delete(itemPath);
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  /**
   * Acquire a permit and call; a provider rate signal waits exactly the
   * signalled time without using up an attempt.
   */
  private async withRetry<T>(
    pool: QuotaPool,
    label: string,
    maxAttempts: number,
    call: () => Promise<TransportResult<T>>,
  ): Promise<TransportResult<T>> {
    let attempts = 0;
    for (;;) {
      await pool.acquire();
      const result = await call();
      if (result.kind === "success") return result;
      if (result.kind === "retryable") {
        this.log.warn("rate limited, waiting", { call: label, after_ms: result.afterMs });
        await this.clock.sleep(result.afterMs);
        continue;
      }
      attempts++;
      if (!result.transient || attempts >= maxAttempts) return result;
      this.log.warn("call failed, retrying", {
        call: label,
        attempt: attempts,
        of: maxAttempts,
        reason: result.reason,
      });
      await this.clock.sleep(this.retryDelayMs);
    }
  }

  private async postErrorNotice(itemPath: string): Promise<void> {
    if (this.pendingErrors.get(itemPath)) {
      this.log.debug("error notice already standing", { path: itemPath });
      return;
    }
    const text = `Error sending file: ${itemPath}. Check logs.`;
    const result = await this.withRetry(this.control, "sendMessage", this.maxAttempts, () =>
      this.backend.sendMessage(this.chatId, text),
    );
    if (result.kind === "success") {
      await this.pendingErrors.set(itemPath, result.value);
    } else {
      this.log.error("error notice could not be posted", { path: itemPath, reason: result.reason });
    }
  }

  private async membership(chatId: string): Promise<MembershipStatus | null> {
    if (this.selfId === null) {
      const me = await this.withRetry(this.control, "getMe", 1, () => this.backend.getSelfId());
      if (me.kind !== "success") {
        this.log.warn("own account lookup failed", { reason: me.reason });
        return null;
      }
      this.selfId = me.value;
    }
    const selfId = this.selfId;
    const status = await this.withRetry(this.control, "getChatMember", 1, () =>
      this.backend.getMembershipStatus(chatId, selfId),
    );
    if (status.kind !== "success") {
      this.log.warn("membership lookup failed", { chat: chatId, reason: status.reason });
      return null;
    }
    return status.value;
  }

  /** Null when forwarding is off; never fails the primary delivery. */
  private async forward(ref: MessageRef): Promise<boolean | null> {
    const target = this.forwardChatId;
    if (!target) return null;

    const status = await this.membership(target);
    if (status === "kicked") {
      this.log.error("removed from forward chat, not forwarding", { chat: target });
      return false;
    }
    if (status === null) return false;

    const result = await this.withRetry(this.media, "forwardMessage", 1, () =>
      this.backend.forwardMessage(target, ref),
    );
    if (result.kind !== "success") {
      this.log.error("forward failed", { chat: target, reason: result.reason });
      return false;
    }
    this.log.info("message forwarded", { chat: target });
    return true;
  }
}
