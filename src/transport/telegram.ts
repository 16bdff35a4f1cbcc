/**
 * Telegram Bot API backend over fetch.
 */
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { classifyFsError } from "../core/exceptions.js";
import type {
  DocumentUpload,
  MembershipStatus,
  MessageRef,
  ParseMode,
  TransportBackend,
  TransportResult,
} from "./backend.js";

export const DEFAULT_TELEGRAM_API = "https://api.telegram.org";

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const EnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional(),
});

const MessageSchema = z.object({
  message_id: z.number().int(),
  chat: z.object({ id: z.union([z.number(), z.string()]) }),
});

const UserSchema = z.object({ id: z.number().int() });

const ChatMemberSchema = z.object({
  status: z.enum(["creator", "administrator", "member", "restricted", "left", "kicked"]),
});

// ---------------------------------------------------------------------------
// Backend
// ---------------------------------------------------------------------------

export interface TelegramOptions {
  token: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

function toMessageRef(result: unknown): MessageRef | null {
  const parsed = MessageSchema.safeParse(result);
  if (!parsed.success) return null;
  return { chatId: String(parsed.data.chat.id), messageId: parsed.data.message_id };
}

export class TelegramBackend implements TransportBackend {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: TelegramOptions) {
    const api = (opts.apiBaseUrl ?? DEFAULT_TELEGRAM_API).replace(/\/+$/, "");
    this.baseUrl = `${api}/bot${opts.token}`;
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async sendDocument(
    chatId: string,
    document: DocumentUpload,
    caption: string,
    parseMode: ParseMode,
  ): Promise<TransportResult<MessageRef>> {
    let bytes: Buffer;
    try {
      bytes = await readFile(document.path);
    } catch (err) {
      throw classifyFsError(err, document.path);
    }
    const form = new FormData();
    form.set("chat_id", chatId);
    form.set("caption", caption);
    form.set("parse_mode", parseMode);
    form.set("document", new Blob([bytes]), document.filename);
    return this.call("sendDocument", form, toMessageRef);
  }

  async sendMessage(
    chatId: string,
    text: string,
    parseMode?: ParseMode,
  ): Promise<TransportResult<MessageRef>> {
    const body: Record<string, string> = { chat_id: chatId, text };
    if (parseMode) body.parse_mode = parseMode;
    return this.call("sendMessage", body, toMessageRef);
  }

  async forwardMessage(chatId: string, source: MessageRef): Promise<TransportResult<MessageRef>> {
    return this.call(
      "forwardMessage",
      { chat_id: chatId, from_chat_id: source.chatId, message_id: source.messageId },
      toMessageRef,
    );
  }

  async deleteMessage(ref: MessageRef): Promise<TransportResult<void>> {
    return this.call(
      "deleteMessage",
      { chat_id: ref.chatId, message_id: ref.messageId },
      (result) => (result === true ? undefined : null),
    );
  }

  async getSelfId(): Promise<TransportResult<number>> {
    return this.call("getMe", {}, (result) => {
      const parsed = UserSchema.safeParse(result);
      return parsed.success ? parsed.data.id : null;
    });
  }

  async getMembershipStatus(
    chatId: string,
    userId: number,
  ): Promise<TransportResult<MembershipStatus>> {
    return this.call("getChatMember", { chat_id: chatId, user_id: userId }, (result) => {
      const parsed = ChatMemberSchema.safeParse(result);
      return parsed.success ? parsed.data.status : null;
    });
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  /** `decode` returns null when `result` does not have the expected shape. */
  private async call<T>(
    method: string,
    body: FormData | Record<string, string | number>,
    decode: (result: unknown) => T | null,
  ): Promise<TransportResult<T>> {
    const init: RequestInit =
      body instanceof FormData
        ? { method: "POST", body }
        : {
            method: "POST",
            headers: { "content-type": "application/json" },
            body: JSON.stringify(body),
          };

    let status: number;
    let text: string;
    const ctl = new AbortController();
    const timeout = setTimeout(() => ctl.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/${method}`, { ...init, signal: ctl.signal });
      status = res.status;
      text = await res.text();
    } catch (err) {
      return {
        kind: "failure",
        failure: "network",
        transient: true,
        reason: `${method}: ${err instanceof Error ? err.message : String(err)}`,
      };
    } finally {
      clearTimeout(timeout);
    }

    let json: unknown = null;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      json = null;
    }
    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      return {
        kind: "failure",
        failure: status >= 500 ? "server" : "malformed",
        transient: true,
        reason: `${method}: unexpected response (HTTP ${status})`,
      };
    }

    const payload = envelope.data;
    if (payload.ok) {
      const value = decode(payload.result);
      if (value === null) {
        return {
          kind: "failure",
          failure: "malformed",
          transient: true,
          reason: `${method}: unexpected result shape`,
        };
      }
      return { kind: "success", value };
    }

    const code = payload.error_code ?? status;
    const reason = `${method}: ${code} ${payload.description ?? "error"}`;
    const retryAfter = payload.parameters?.retry_after;
    if (code === 429 && retryAfter !== undefined && retryAfter >= 0) {
      return { kind: "retryable", afterMs: retryAfter * 1000, reason };
    }
    if (code === 429 || code >= 500) {
      return { kind: "failure", failure: "server", transient: true, reason };
    }
    if (code === 401 || code === 403) {
      return { kind: "failure", failure: "auth", transient: false, reason };
    }
    return { kind: "failure", failure: "rejected", transient: false, reason };
  }
}
