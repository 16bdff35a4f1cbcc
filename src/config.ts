/**
 * Configuration validation and backend factory.
 */
import { readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { assertArchiveSpec } from "./archive/archiver.js";
import { MAX_CHUNK_BYTES } from "./archive/splitter.js";
import { ConfigError } from "./core/exceptions.js";
import type { PendingErrors } from "./core/state.js";
import type { ArchiveSpec, Clock } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { SQLiteBackend } from "./db/sqlite.js";
import type { Logger } from "./log.js";
import { JsonStatePersistence } from "./state/json.js";
import type { StatePersistence } from "./state/persistence.js";
import { SqliteStatePersistence } from "./state/sqlite.js";
import { DiskStorage } from "./storage/disk.js";
import type { TransportBackend } from "./transport/backend.js";
import { RateLimitedTransport } from "./transport/delivery.js";
import { QuotaPool } from "./transport/ratelimit.js";
import { DEFAULT_TELEGRAM_API, TelegramBackend } from "./transport/telegram.js";

export const DEFAULT_CONFIG_PATH = "config/config.json";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const TelegramConfigSchema = z.object({
  token: z.string().min(1),
  chatId: z.union([z.string().min(1), z.number().int()]).transform(String),
  forwardChatId: z
    .union([z.string(), z.number().int()])
    .nullable()
    .default(null)
    .transform((v) => (v === null || v === "" ? null : String(v))),
  enableForward: z.boolean().default(false),
  apiBaseUrl: z.string().url().default(DEFAULT_TELEGRAM_API),
});

const GeneralConfigSchema = z.object({
  foldersToMonitor: z.array(z.string().min(1)).default([]),
  checkIntervalSec: z.number().positive().default(60),
  allowedExtensions: z.array(z.string()).default([]),
  enableCache: z.boolean().default(true),
  compressionLevel: z.enum(["default", "fast", "none"]).default("default"),
  enableEncryption: z.boolean().default(false),
  zipPassword: z.string().default(""),
  scratchDir: z.string().nullable().default(null),
  maxChunkBytes: z.number().int().positive().default(MAX_CHUNK_BYTES),
});

const PoolConfigSchema = z.object({
  limit: z.number().int().positive(),
  windowSec: z.number().positive(),
});

const TransportConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  retryDelaySec: z.number().nonnegative().default(5),
  requestTimeoutSec: z.number().positive().default(60),
  controlPool: PoolConfigSchema.default({ limit: 1, windowSec: 1 }),
  mediaPool: PoolConfigSchema.default({ limit: 20, windowSec: 60 }),
});

const StateConfigSchema = z.object({
  provider: z.enum(["json", "sqlite"]).default("json"),
  config: z
    .object({
      dir: z.string().default("data"),
      path: z.string().default(join("data", "courier.db")),
    })
    .default({}),
});

const AggregatorConfigSchema = z.object({
  url: z.string().url().nullable().default("http://localhost:5000"),
  timeoutSec: z.number().positive().default(5),
});

const LoggingConfigSchema = z.object({
  dir: z.string().nullable().default("logs"),
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  disabled: z.boolean().default(false),
  retentionDays: z.number().positive().default(7),
});

export const ConfigSchema = z.object({
  telegram: TelegramConfigSchema,
  general: GeneralConfigSchema.default({}),
  transport: TransportConfigSchema.default({}),
  state: StateConfigSchema.default({}),
  aggregator: AggregatorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type CourierConfig = z.infer<typeof ConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function buildArchiveSpec(config: CourierConfig): ArchiveSpec {
  return {
    compression: config.general.compressionLevel,
    encrypt: config.general.enableEncryption,
    passphrase: config.general.zipPassword,
  };
}

/**
 * Validate a raw config object. Schema violations and inconsistent archive
 * settings both surface as {@link ConfigError}.
 */
export function parseConfig(raw: unknown): CourierConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(issues.join("; "));
  }
  assertArchiveSpec(buildArchiveSpec(parsed.data));
  return parsed.data;
}

export async function loadConfig(path: string = DEFAULT_CONFIG_PATH): Promise<CourierConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseConfig(raw);
}

export function scratchDirOf(config: CourierConfig): string {
  return config.general.scratchDir ?? tmpdir();
}

/** Forward target, only when forwarding is switched on and a chat is set. */
export function forwardTarget(config: CourierConfig): string | null {
  return config.telegram.enableForward ? config.telegram.forwardChatId : null;
}

// ---------------------------------------------------------------------------
// State factories
// ---------------------------------------------------------------------------

export interface BuiltPersistence {
  persistence: StatePersistence;
  /** Set for the sqlite provider so the owner can close it. */
  db: DatabaseBackend | null;
}

export async function buildPersistence(config: CourierConfig, log: Logger): Promise<BuiltPersistence> {
  const { provider, config: opts } = config.state;
  switch (provider) {
    case "json":
      return { persistence: new JsonStatePersistence(new DiskStorage(opts.dir), log), db: null };
    case "sqlite": {
      const db = await SQLiteBackend.open(opts.path);
      await db.initialize();
      return { persistence: new SqliteStatePersistence(db, log), db };
    }
  }
}

// ---------------------------------------------------------------------------
// Transport factory
// ---------------------------------------------------------------------------

export interface TransportDeps {
  pendingErrors: PendingErrors;
  clock: Clock;
  log: Logger;
  /** Replaces the Telegram backend, e.g. with a scripted one. */
  backend?: TransportBackend;
  fetchImpl?: typeof fetch;
}

export function buildTransport(config: CourierConfig, deps: TransportDeps): RateLimitedTransport {
  const t = config.transport;
  const backend =
    deps.backend ??
    new TelegramBackend({
      token: config.telegram.token,
      apiBaseUrl: config.telegram.apiBaseUrl,
      timeoutMs: t.requestTimeoutSec * 1000,
      fetchImpl: deps.fetchImpl,
    });

  return new RateLimitedTransport({
    backend,
    chatId: config.telegram.chatId,
    forwardChatId: forwardTarget(config),
    pools: {
      control: new QuotaPool("control", { limit: t.controlPool.limit, windowMs: t.controlPool.windowSec * 1000 }, deps.clock),
      media: new QuotaPool("media", { limit: t.mediaPool.limit, windowMs: t.mediaPool.windowSec * 1000 }, deps.clock),
    },
    pendingErrors: deps.pendingErrors,
    clock: deps.clock,
    log: deps.log,
    maxAttempts: t.maxAttempts,
    retryDelayMs: t.retryDelaySec * 1000,
  });
}
