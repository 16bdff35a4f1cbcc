/**
 * Best-effort push of delivery outcomes to the external aggregator.
 */
import type { Logger } from "../log.js";

export interface DeliveryEvent {
  type: "success" | "failure";
  file: string;
  file_id: number | null;
  hash: string;
  file_size: number;
  processing_time: number;
  upload_speed: number;
}

export interface NotifierOptions {
  /** Aggregator base URL; the notifier does nothing when null. */
  baseUrl: string | null;
  timeoutMs?: number;
  log: Logger;
  fetchImpl?: typeof fetch;
}

export class EventNotifier {
  private readonly baseUrl: string | null;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: NotifierOptions) {
    this.baseUrl = opts.baseUrl ? opts.baseUrl.replace(/\/+$/, "") : null;
    this.timeoutMs = opts.timeoutMs ?? 5_000;
    this.log = opts.log;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** Never throws. */
  async notify(event: DeliveryEvent): Promise<void> {
    await this.post("/event", event);
  }

  /** Never throws. */
  async publishHistory(snapshot: Record<string, unknown>): Promise<void> {
    await this.post("/file_history", snapshot);
  }

  private async post(route: string, body: unknown): Promise<void> {
    if (!this.baseUrl) return;
    const ctl = new AbortController();
    const timeout = setTimeout(() => ctl.abort(), this.timeoutMs);
    try {
      const res = await this.fetchImpl(`${this.baseUrl}${route}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(body),
        signal: ctl.signal,
      });
      if (!res.ok) {
        const text = await res.text();
        this.log.warn("aggregator rejected post", { route, status: res.status, body: text.slice(0, 200) });
      }
    } catch (err) {
      this.log.warn("aggregator unreachable", {
        route,
        error: err instanceof Error ? err.message : String(err),
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
