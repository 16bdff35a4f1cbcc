/**
 * Per-file delivery pipeline: fingerprint → dedup → archive → (split) → deliver → commit.
 */
import { mkdtemp, rm, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import { buildArtifact } from "../archive/archiver.js";
import { MAX_CHUNK_BYTES, reassemblyInstructions, splitArtifact } from "../archive/splitter.js";
import type { Logger } from "../log.js";
import type { DeliveryEvent, EventNotifier } from "../notify/aggregator.js";
import type { RateLimitedTransport } from "../transport/delivery.js";
import { codeBlock, formatCaption } from "../transport/markdown.js";
import { systemClock } from "./clock.js";
import { TransientIOError, classifyFsError } from "./exceptions.js";
import { hashFile } from "./hasher.js";
import type { LedgerEntry } from "./ledger.js";
import type { PipelineState } from "./state.js";
import type { ArchiveSpec, Artifact, CandidateResult, Clock } from "./types.js";

type SendResult =
  | { ok: true; forwarded: boolean | null; parts: number }
  | { ok: false; reason: string };

export interface PipelineOptions {
  state: PipelineState;
  transport: RateLimitedTransport;
  notifier: EventNotifier;
  archive: ArchiveSpec;
  /** Parent directory for per-file scratch directories. */
  scratchDir: string;
  /** Lower-case suffixes; empty accepts every file. */
  allowedExtensions?: string[];
  maxChunkBytes?: number;
  clock?: Clock;
  log: Logger;
}

export class DeliveryPipeline {
  private state: PipelineState;
  private transport: RateLimitedTransport;
  private notifier: EventNotifier;
  private archive: ArchiveSpec;
  private scratchDir: string;
  private allowedExtensions: string[];
  private maxChunkBytes: number;
  private clock: Clock;
  private log: Logger;

  constructor(opts: PipelineOptions) {
    this.state = opts.state;
    this.transport = opts.transport;
    this.notifier = opts.notifier;
    this.archive = opts.archive;
    this.scratchDir = opts.scratchDir;
    this.allowedExtensions = (opts.allowedExtensions ?? []).map((e) => e.trim().toLowerCase()).filter(Boolean);
    this.maxChunkBytes = opts.maxChunkBytes ?? MAX_CHUNK_BYTES;
    this.clock = opts.clock ?? systemClock;
    this.log = opts.log;
  }

  isAllowed(fileName: string): boolean {
    if (this.allowedExtensions.length === 0) return true;
    const lower = fileName.toLowerCase();
    return this.allowedExtensions.some((ext) => lower.endsWith(ext));
  }

  /** Drive one candidate to a terminal outcome. Never throws. */
  async process(path: string): Promise<CandidateResult> {
    const started = this.clock.now();
    const ledger = this.state.ledger;

    if (!this.isAllowed(basename(path))) {
      this.log.debug("ignored, extension not allowed", { path });
      return { path, outcome: "skipped", reason: "extension" };
    }

    let hash: string;
    let originalSize: number;
    try {
      hash = await hashFile(path);
      originalSize = (await stat(path)).size;
    } catch (err) {
      const mapped = classifyFsError(err, path);
      this.log.warn("cannot read candidate, retrying next cycle", { path, error: mapped.message });
      return { path, outcome: "skipped", reason: mapped instanceof TransientIOError ? "vanished" : mapped.message };
    }

    if (!ledger.isStaleOrNew(path, hash)) {
      return { path, outcome: "skipped", reason: "unchanged" };
    }
    if (ledger.lookupByHash(hash)) {
      this.log.debug("content already delivered", { path, hash });
      return { path, outcome: "skipped", reason: "duplicate" };
    }

    this.log.info("new or modified file", { path, size: originalSize });
    const failure = (reason: string): CandidateResult => {
      this.log.error("delivery failed", { path, reason });
      return { path, outcome: "failed", reason };
    };

    let scratch: string | null = null;
    try {
      scratch = await mkdtemp(join(this.scratchDir, "courier-"));
      const artifact = await buildArtifact(path, this.archive, scratch);

      const uploadStarted = this.clock.now();
      const sent =
        artifact.size > this.maxChunkBytes
          ? await this.sendSplit(path, artifact, scratch)
          : await this.sendSingle(path, artifact);
      const uploadMs = this.clock.now() - uploadStarted;

      if (!sent.ok) {
        await this.notifier.notify(this.event("failure", path, null, hash, originalSize, started, 0));
        return failure(sent.reason);
      }

      const entry: LedgerEntry = {
        hash,
        lastSentAt: new Date(this.clock.now()).toISOString(),
        deliverySucceeded: true,
        forwardSucceeded: sent.forwarded,
        encrypted: artifact.encrypted,
        encryptionAlgorithm: artifact.encrypted ? "AES" : "None",
        originalSize,
        processedSize: artifact.size,
        processingTimeMs: this.clock.now() - started,
        uploadBytesPerSec: uploadMs > 0 ? artifact.size / (uploadMs / 1000) : 0,
        parts: sent.parts,
      };
      const sequenceId = await ledger.commit(path, entry);
      this.log.info("delivered", { path, file_id: sequenceId, parts: entry.parts });

      try {
        await this.transport.retractErrorNotice(path);
      } catch (err) {
        this.log.error("error notice cleanup failed", { path, error: String(err) });
      }
      await this.notifier.notify(
        this.event("success", path, sequenceId, hash, originalSize, started, entry.uploadBytesPerSec),
      );
      return { path, outcome: "delivered", sequenceId };
    } catch (err) {
      const reason = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
      await this.notifier.notify(this.event("failure", path, null, hash, originalSize, started, 0));
      return failure(reason);
    } finally {
      if (scratch) await rm(scratch, { recursive: true, force: true });
    }
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async sendSingle(path: string, artifact: Artifact): Promise<SendResult> {
    const caption = formatCaption({ filename: basename(path), encrypted: artifact.encrypted });
    const result = await this.transport.sendDocument(
      path,
      { path: artifact.path, filename: basename(artifact.path) },
      caption,
    );
    return result.ok ? { ok: true, forwarded: result.forwarded, parts: 1 } : result;
  }

  /** Parts go out strictly in order; the first failed part aborts the file. */
  private async sendSplit(path: string, artifact: Artifact, scratch: string): Promise<SendResult> {
    this.log.info("splitting artifact", { path, size: artifact.size, chunk: this.maxChunkBytes });
    let forwarded: boolean | null = null;
    let total = 0;

    for await (const part of splitArtifact(artifact.path, scratch, this.maxChunkBytes)) {
      total = part.total;
      const caption = formatCaption({
        filename: basename(path),
        encrypted: artifact.encrypted,
        part: { index: part.index, total: part.total },
      });
      const result = await this.transport.sendDocument(
        path,
        { path: part.path, filename: basename(part.path) },
        caption,
      );
      if (!result.ok) {
        return { ok: false, reason: `part ${part.index}/${part.total}: ${result.reason}` };
      }
      if (result.forwarded !== null) forwarded = (forwarded ?? true) && result.forwarded;
      await rm(part.path, { force: true });
    }

    const instructions = reassemblyInstructions(basename(artifact.path), total, artifact.encrypted);
    const note = await this.transport.broadcastMessage(codeBlock(instructions), "MarkdownV2");
    if (!note.ok) {
      this.log.warn("reassembly instructions not delivered", { path, reason: note.reason });
    }
    return { ok: true, forwarded, parts: total };
  }

  private event(
    type: DeliveryEvent["type"],
    path: string,
    fileId: number | null,
    hash: string,
    size: number,
    started: number,
    uploadSpeed: number,
  ): DeliveryEvent {
    return {
      type,
      file: path,
      file_id: fileId,
      hash,
      file_size: size,
      processing_time: this.clock.now() - started,
      upload_speed: uploadSpeed,
    };
  }
}
