/**
 * file-courier: watches folders and delivers new or changed files to a chat.
 */
import { mkdir } from "node:fs/promises";

import {
  buildArchiveSpec,
  buildPersistence,
  buildTransport,
  parseConfig,
  scratchDirOf,
  type CourierConfig,
} from "./config.js";
import { systemClock } from "./core/clock.js";
import type { StoredRecord } from "./core/ledger.js";
import { DeliveryPipeline } from "./core/pipeline.js";
import { ScanScheduler } from "./core/scheduler.js";
import { PipelineState } from "./core/state.js";
import type { Clock, CycleReport } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { clearLogFiles, createLogger, pruneLogFiles, type Logger } from "./log.js";
import { EventNotifier } from "./notify/aggregator.js";
import type { StatePersistence } from "./state/persistence.js";
import type { TransportBackend } from "./transport/backend.js";

export { ConfigSchema, loadConfig, parseConfig, type CourierConfig } from "./config.js";
export * from "./core/exceptions.js";
export type { FileRecord, CycleReport, CandidateResult, ArchiveSpec, Clock } from "./core/types.js";
export type { StoredRecord } from "./core/ledger.js";
export type { DeliveryEvent } from "./notify/aggregator.js";
export type { StatePersistence, StateDocument } from "./state/persistence.js";
export type { TransportBackend, TransportResult, MessageRef } from "./transport/backend.js";
export type { Logger } from "./log.js";
export { joinParts } from "./archive/splitter.js";
export { unsealFile } from "./archive/seal.js";

/** Seams replaced in tests or by embedding applications. */
export interface CourierOverrides {
  log?: Logger;
  clock?: Clock;
  fetchImpl?: typeof fetch;
  backend?: TransportBackend;
  persistence?: StatePersistence;
}

export class FileCourier {
  private constructor(
    readonly config: CourierConfig,
    private state: PipelineState,
    private scheduler: ScanScheduler,
    private notifier: EventNotifier,
    private db: DatabaseBackend | null,
    private log: Logger,
  ) {}

  /** Construct from a configuration object (validates with Zod). */
  static async fromConfig(raw: unknown, overrides: CourierOverrides = {}): Promise<FileCourier> {
    const config = parseConfig(raw);
    const logging = config.logging;
    const log =
      overrides.log ??
      createLogger({
        level: logging.disabled ? "silent" : logging.level,
        dir: logging.disabled ? null : logging.dir,
      });
    const clock = overrides.clock ?? systemClock;

    const built = overrides.persistence
      ? { persistence: overrides.persistence, db: null }
      : await buildPersistence(config, log.child("state"));
    const state = new PipelineState(built.persistence, log.child("state"));

    const scratchDir = scratchDirOf(config);
    await mkdir(scratchDir, { recursive: true });

    const notifier = new EventNotifier({
      baseUrl: config.aggregator.url,
      timeoutMs: config.aggregator.timeoutSec * 1000,
      log: log.child("aggregator"),
      fetchImpl: overrides.fetchImpl,
    });
    const transport = buildTransport(config, {
      pendingErrors: state.pendingErrors,
      clock,
      log: log.child("transport"),
      backend: overrides.backend,
      fetchImpl: overrides.fetchImpl,
    });
    const pipeline = new DeliveryPipeline({
      state,
      transport,
      notifier,
      archive: buildArchiveSpec(config),
      scratchDir,
      allowedExtensions: config.general.allowedExtensions,
      maxChunkBytes: config.general.maxChunkBytes,
      clock,
      log: log.child("pipeline"),
    });

    const logDir = logging.disabled ? null : logging.dir;
    const scheduler = new ScanScheduler({
      roots: config.general.foldersToMonitor,
      pipeline,
      state,
      sizeCache: config.general.enableCache,
      intervalMs: config.general.checkIntervalSec * 1000,
      clock,
      log: log.child("scheduler"),
      onCycleStart: logDir
        ? async () => {
            const removed = await pruneLogFiles(logDir, logging.retentionDays, clock.now());
            if (removed.length > 0) log.info("old log files removed", { count: removed.length });
          }
        : undefined,
    });

    return new FileCourier(config, state, scheduler, notifier, built.db, log);
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Run a single scan cycle. */
  async runOnce(): Promise<CycleReport> {
    return this.scheduler.runCycle();
  }

  /** Publish the ledger to the aggregator, then cycle until {@link stop}. */
  async start(): Promise<void> {
    try {
      await this.state.load();
      this.log.info("starting", {
        folders: this.config.general.foldersToMonitor,
        history_entries: this.state.ledger.size,
      });
      await this.notifier.publishHistory(this.state.ledger.snapshot());
    } catch (err) {
      // The first cycle retries the load.
      this.log.error("history unavailable at startup", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    await this.scheduler.run();
  }

  stop(): void {
    this.scheduler.stop();
  }

  /** Current ledger as stored, keyed by path. */
  async history(): Promise<Record<string, StoredRecord>> {
    await this.state.load();
    return this.state.ledger.snapshot();
  }

  /** Empty the ledger, size cache and pending notices. */
  async clearState(): Promise<void> {
    await this.state.reset();
    this.log.info("state cleared");
  }

  /** Truncate log files; returns the files touched. */
  async clearLogs(): Promise<string[]> {
    const dir = this.config.logging.dir;
    if (!dir) return [];
    const files = await clearLogFiles(dir);
    this.log.info("log files cleared", { count: files.length });
    return files;
  }

  async close(): Promise<void> {
    await this.db?.close();
  }
}
