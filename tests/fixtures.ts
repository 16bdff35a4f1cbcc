/**
 * Shared test fixtures: temp dirs, in-memory state, scripted transport, virtual clock.
 */
import { mkdtempSync, readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";

import { DeliveryPipeline } from "../src/core/pipeline.js";
import { ScanScheduler } from "../src/core/scheduler.js";
import { PipelineState } from "../src/core/state.js";
import type { ArchiveSpec, Clock } from "../src/core/types.js";
import { silentLogger } from "../src/log.js";
import { EventNotifier } from "../src/notify/aggregator.js";
import {
  STATE_DOCUMENTS,
  type JsonObject,
  type StateDocument,
  type StatePersistence,
} from "../src/state/persistence.js";
import type {
  DocumentUpload,
  MembershipStatus,
  MessageRef,
  ParseMode,
  TransportBackend,
  TransportResult,
} from "../src/transport/backend.js";
import { RateLimitedTransport } from "../src/transport/delivery.js";
import { QuotaPool } from "../src/transport/ratelimit.js";

// ---------------------------------------------------------------------------
// Temp dir + file helpers
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "courier-test-"));
}

export function writeFile(path: string, data: string | Uint8Array): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, data);
  return path;
}

/** Deterministic, poorly compressible bytes. */
export function noise(size: number, seed = 1): Uint8Array {
  const out = new Uint8Array(size);
  let x = seed;
  for (let i = 0; i < size; i++) {
    x = (x * 1103515245 + 12345) & 0x7fffffff;
    out[i] = x >>> 16;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Virtual clock
// ---------------------------------------------------------------------------

/** Sleeping advances virtual time and resolves at once. */
export class ManualClock implements Clock {
  sleeps: number[] = [];
  onSleep: ((ms: number) => void) | null = null;

  constructor(public time = Date.UTC(2024, 0, 1)) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw abortError();
    this.sleeps.push(ms);
    this.time += Math.max(0, ms);
    this.onSleep?.(ms);
    if (signal?.aborted) throw abortError();
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

function abortError(): Error {
  const err = new Error("The operation was aborted");
  err.name = "AbortError";
  return err;
}

// ---------------------------------------------------------------------------
// In-memory persistence
// ---------------------------------------------------------------------------

export class MemoryPersistence implements StatePersistence {
  docs = new Map<StateDocument, string>();
  saves: StateDocument[] = [];
  failSaves = false;

  async load(doc: StateDocument): Promise<JsonObject> {
    const text = this.docs.get(doc);
    return text ? JSON.parse(text) : {};
  }

  async save(doc: StateDocument, data: JsonObject): Promise<void> {
    if (this.failSaves) throw new Error("disk unavailable");
    this.saves.push(doc);
    this.docs.set(doc, JSON.stringify(data));
  }

  async clear(): Promise<void> {
    for (const doc of STATE_DOCUMENTS) this.docs.set(doc, "{}");
  }
}

// ---------------------------------------------------------------------------
// Scripted transport backend
// ---------------------------------------------------------------------------

export interface SentDocument {
  chatId: string;
  filename: string;
  caption: string;
  bytes: Uint8Array;
}

type Script<T> = TransportResult<T>[];

/**
 * Answers each call from its method's script, then succeeds. Uploaded bytes
 * are captured at call time since the pipeline deletes parts after sending.
 */
export class FakeTransportBackend implements TransportBackend {
  documents: SentDocument[] = [];
  messages: { chatId: string; text: string; parseMode?: ParseMode }[] = [];
  forwards: { chatId: string; source: MessageRef }[] = [];
  deletes: MessageRef[] = [];
  calls: string[] = [];

  documentScript: Script<MessageRef> = [];
  messageScript: Script<MessageRef> = [];
  forwardScript: Script<MessageRef> = [];
  deleteScript: Script<void> = [];
  membership: MembershipStatus = "member";

  private nextId = 100;

  async sendDocument(
    chatId: string,
    document: DocumentUpload,
    caption: string,
  ): Promise<TransportResult<MessageRef>> {
    this.calls.push("sendDocument");
    const scripted = this.documentScript.shift();
    if (scripted) return scripted;
    this.documents.push({
      chatId,
      filename: document.filename,
      caption,
      bytes: new Uint8Array(readFileSync(document.path)),
    });
    return this.ok(chatId);
  }

  async sendMessage(chatId: string, text: string, parseMode?: ParseMode): Promise<TransportResult<MessageRef>> {
    this.calls.push("sendMessage");
    const scripted = this.messageScript.shift();
    if (scripted) return scripted;
    this.messages.push({ chatId, text, parseMode });
    return this.ok(chatId);
  }

  async forwardMessage(chatId: string, source: MessageRef): Promise<TransportResult<MessageRef>> {
    this.calls.push("forwardMessage");
    const scripted = this.forwardScript.shift();
    if (scripted) return scripted;
    this.forwards.push({ chatId, source });
    return this.ok(chatId);
  }

  async deleteMessage(ref: MessageRef): Promise<TransportResult<void>> {
    this.calls.push("deleteMessage");
    const scripted = this.deleteScript.shift();
    if (scripted) return scripted;
    this.deletes.push(ref);
    return { kind: "success", value: undefined };
  }

  async getSelfId(): Promise<TransportResult<number>> {
    this.calls.push("getMe");
    return { kind: "success", value: 42 };
  }

  async getMembershipStatus(): Promise<TransportResult<MembershipStatus>> {
    this.calls.push("getChatMember");
    return { kind: "success", value: this.membership };
  }

  private ok(chatId: string): TransportResult<MessageRef> {
    return { kind: "success", value: { chatId, messageId: this.nextId++ } };
  }
}

export const transientFailure = (reason = "boom"): TransportResult<never> => ({
  kind: "failure",
  failure: "server",
  transient: true,
  reason,
});

// ---------------------------------------------------------------------------
// Pre-wired pipeline
// ---------------------------------------------------------------------------

export interface Harness {
  dir: string;
  watched: string;
  clock: ManualClock;
  persistence: MemoryPersistence;
  state: PipelineState;
  backend: FakeTransportBackend;
  transport: RateLimitedTransport;
  pipeline: DeliveryPipeline;
  scheduler: ScanScheduler;
}

export interface HarnessOptions {
  archive?: Partial<ArchiveSpec>;
  maxChunkBytes?: number;
  allowedExtensions?: string[];
  forwardChatId?: string | null;
  persistence?: MemoryPersistence;
  backend?: FakeTransportBackend;
  notifier?: EventNotifier;
}

export function makeHarness(opts: HarnessOptions = {}): Harness {
  const dir = makeTmpDir();
  const watched = join(dir, "watched");
  const scratch = join(dir, "scratch");
  mkdirSync(watched, { recursive: true });
  mkdirSync(scratch, { recursive: true });

  const clock = new ManualClock();
  const persistence = opts.persistence ?? new MemoryPersistence();
  const state = new PipelineState(persistence, silentLogger);
  const backend = opts.backend ?? new FakeTransportBackend();
  const transport = new RateLimitedTransport({
    backend,
    chatId: "primary",
    forwardChatId: opts.forwardChatId ?? null,
    pools: {
      control: new QuotaPool("control", { limit: 100, windowMs: 1000 }, clock),
      media: new QuotaPool("media", { limit: 100, windowMs: 1000 }, clock),
    },
    pendingErrors: state.pendingErrors,
    clock,
    log: silentLogger,
  });
  const pipeline = new DeliveryPipeline({
    state,
    transport,
    notifier: opts.notifier ?? new EventNotifier({ baseUrl: null, log: silentLogger }),
    archive: { compression: "default", encrypt: false, passphrase: "", ...opts.archive },
    scratchDir: scratch,
    allowedExtensions: opts.allowedExtensions,
    maxChunkBytes: opts.maxChunkBytes,
    clock,
    log: silentLogger,
  });
  const scheduler = new ScanScheduler({
    roots: [watched],
    pipeline,
    state,
    intervalMs: 60_000,
    clock,
    log: silentLogger,
  });
  return { dir, watched, clock, persistence, state, backend, transport, pipeline, scheduler };
}
