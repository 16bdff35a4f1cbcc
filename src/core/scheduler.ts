/**
 * Scan loop: enumerate monitored roots, order by size, run each candidate.
 */
import { readdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Logger } from "../log.js";
import { isAbortError, systemClock } from "./clock.js";
import type { DeliveryPipeline } from "./pipeline.js";
import type { PipelineState } from "./state.js";
import type { CandidateResult, Clock, CycleReport } from "./types.js";

export interface SchedulerOptions {
  roots: string[];
  pipeline: DeliveryPipeline;
  state: PipelineState;
  /** Persist the per-cycle size measurement as the size cache. */
  sizeCache?: boolean;
  intervalMs: number;
  clock?: Clock;
  log: Logger;
  /** Runs before every cycle; a failure is logged and the cycle continues. */
  onCycleStart?: () => Promise<void>;
}

export class ScanScheduler {
  private roots: string[];
  private pipeline: DeliveryPipeline;
  private state: PipelineState;
  private sizeCache: boolean;
  private intervalMs: number;
  private clock: Clock;
  private log: Logger;
  private onCycleStart?: () => Promise<void>;
  private abort = new AbortController();
  private running = false;

  constructor(opts: SchedulerOptions) {
    this.roots = opts.roots.map((r) => resolve(r));
    this.pipeline = opts.pipeline;
    this.state = opts.state;
    this.sizeCache = opts.sizeCache ?? true;
    this.intervalMs = opts.intervalMs;
    this.clock = opts.clock ?? systemClock;
    this.log = opts.log;
    this.onCycleStart = opts.onCycleStart;
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  /** Every regular file below the monitored roots; missing roots are skipped. */
  async enumerate(): Promise<string[]> {
    const files: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          files.push(full);
        }
      }
    };

    for (const root of this.roots) {
      try {
        await walk(root);
      } catch (err) {
        this.log.warn("cannot scan folder", {
          root,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return files;
  }

  /**
   * Candidates smallest first; ties in path order. A file that cannot be
   * measured takes its cached size, or sorts last without one.
   */
  async order(files: string[]): Promise<string[]> {
    const sizes = new Map<string, number>();
    for (const file of files) {
      try {
        sizes.set(file, (await stat(file)).size);
      } catch {
        sizes.set(file, Number.POSITIVE_INFINITY);
      }
    }

    const cached = new Map<string, number>();
    for (const file of files) {
      const size = this.state.sizes.get(file);
      if (size !== undefined) cached.set(file, size);
    }
    if (this.sizeCache) {
      const measured = new Map([...sizes].filter(([, size]) => Number.isFinite(size)));
      try {
        await this.state.sizes.rebuild(measured);
      } catch (err) {
        this.log.warn("size cache not saved", { error: err instanceof Error ? err.message : String(err) });
      }
    }
    const sizeOf = (file: string): number => {
      const size = sizes.get(file) ?? Number.POSITIVE_INFINITY;
      return Number.isFinite(size) ? size : (cached.get(file) ?? size);
    };

    return [...files].sort((a, b) => sizeOf(a) - sizeOf(b) || (a < b ? -1 : a > b ? 1 : 0));
  }

  /**
   * One full pass. Throws only when state cannot be loaded; each candidate's
   * failure is contained.
   */
  async runCycle(): Promise<CycleReport> {
    const startedAt = new Date(this.clock.now()).toISOString();
    if (this.onCycleStart) {
      try {
        await this.onCycleStart();
      } catch (err) {
        this.log.warn("cycle hook failed", { error: String(err) });
      }
    }

    await this.state.load();
    const candidates = await this.order(await this.enumerate());
    this.log.debug("cycle started", { candidates: candidates.length });

    const results: CandidateResult[] = [];
    for (const path of candidates) {
      if (this.stopped) break;
      try {
        results.push(await this.pipeline.process(path));
      } catch (err) {
        this.log.error("candidate crashed", { path, error: String(err) });
        results.push({ path, outcome: "failed", reason: String(err) });
      }
    }

    const count = (outcome: CandidateResult["outcome"]) =>
      results.filter((r) => r.outcome === outcome).length;
    const report: CycleReport = {
      startedAt,
      candidates: candidates.length,
      delivered: count("delivered"),
      skipped: count("skipped"),
      failed: count("failed"),
      results,
    };
    this.log.info("cycle finished", {
      candidates: report.candidates,
      delivered: report.delivered,
      skipped: report.skipped,
      failed: report.failed,
    });
    return report;
  }

  /** Cycle until {@link stop}; a failed cycle waits the normal interval and retries. */
  async run(): Promise<void> {
    if (this.running) throw new Error("scheduler already running");
    this.running = true;
    try {
      while (!this.stopped) {
        try {
          await this.runCycle();
        } catch (err) {
          this.log.error("cycle aborted", { error: err instanceof Error ? err.message : String(err) });
        }
        if (this.stopped) break;
        try {
          await this.clock.sleep(this.intervalMs, this.abort.signal);
        } catch (err) {
          if (!isAbortError(err)) throw err;
        }
      }
    } finally {
      this.running = false;
      this.log.info("scheduler stopped");
    }
  }

  /** Stop after the in-flight candidate; interrupts the inter-cycle sleep. */
  stop(): void {
    this.abort.abort();
  }
}
