/**
 * Console logger with an optional append-only file sink.
 */
import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { readdir, stat, truncate, unlink } from "node:fs/promises";
import { join } from "node:path";
import { errnoCode } from "./core/exceptions.js";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Directory for `courier.log`; console only when omitted. */
  dir?: string | null;
  scope?: string;
}

export const LOG_FILE_NAME = "courier.log";

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Emit = (level: Exclude<LogLevel, "silent">, line: string) => void;

function formatLine(
  level: string,
  scope: string | undefined,
  msg: string,
  fields?: LogFields,
): string {
  const tag = scope ? ` [${scope}]` : "";
  const extra = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
  return `${new Date().toISOString()} ${level.toUpperCase()}${tag} ${msg}${extra}`;
}

function build(threshold: number, emit: Emit, scope?: string): Logger {
  const at =
    (level: Exclude<LogLevel, "silent">) =>
    (msg: string, fields?: LogFields): void => {
      if (RANK[level] < threshold) return;
      emit(level, formatLine(level, scope, msg, fields));
    };

  return {
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
    child: (child: string) => build(threshold, emit, scope ? `${scope}:${child}` : child),
  };
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = RANK[opts.level ?? "info"];
  let sink: WriteStream | null = null;
  if (opts.dir && threshold < RANK.silent) {
    mkdirSync(opts.dir, { recursive: true });
    sink = createWriteStream(join(opts.dir, LOG_FILE_NAME), { flags: "a" });
  }

  const emit: Emit = (level, line) => {
    if (level === "warn" || level === "error") console.error(line);
    else console.log(line);
    sink?.write(`${line}\n`);
  };

  return build(threshold, emit, opts.scope);
}

/** Logger that drops everything. */
export const silentLogger: Logger = build(RANK.silent, () => undefined);

async function listLogFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.endsWith(".log"))
      .map((e) => join(dir, e.name));
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw err;
  }
}

/** Delete `*.log` files whose last change is older than `retentionDays`. */
export async function pruneLogFiles(
  dir: string,
  retentionDays: number,
  now: number = Date.now(),
): Promise<string[]> {
  const cutoff = now - retentionDays * 24 * 60 * 60 * 1000;
  const removed: string[] = [];
  for (const file of await listLogFiles(dir)) {
    const st = await stat(file);
    if (st.mtimeMs < cutoff) {
      await unlink(file);
      removed.push(file);
    }
  }
  return removed;
}

/** Truncate every `*.log` file in `dir` to zero bytes. */
export async function clearLogFiles(dir: string): Promise<string[]> {
  const files = await listLogFiles(dir);
  for (const file of files) {
    await truncate(file, 0);
  }
  return files;
}
