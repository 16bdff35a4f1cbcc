/**
 * Custom exceptions for the delivery pipeline.
 */

export class ConfigError extends Error {
  constructor(message?: string) {
    super(message ? `Invalid configuration: ${message}` : "Invalid configuration");
    this.name = "ConfigError";
  }
}

export class EncryptionConfigError extends ConfigError {
  constructor(message = "encryption is enabled but no password is set") {
    super(message);
    this.name = "EncryptionConfigError";
  }
}

/** The candidate can be retried on the next cycle (vanished file, full disk). */
export class TransientIOError extends Error {
  path: string;

  constructor(path: string, message?: string) {
    super(message ? `I/O failed for ${path}: ${message}` : `I/O failed for ${path}`);
    this.name = "TransientIOError";
    this.path = path;
  }
}

export class DiskFullError extends TransientIOError {
  constructor(path: string) {
    super(path, "no space left on device");
    this.name = "DiskFullError";
  }
}

export class PermissionError extends Error {
  path: string;

  constructor(path: string) {
    super(`Permission denied: ${path}`);
    this.name = "PermissionError";
    this.path = path;
  }
}

export class LedgerLoadError extends Error {
  constructor(message: string) {
    super(`Ledger could not be loaded: ${message}`);
    this.name = "LedgerLoadError";
  }
}

export class DecryptionError extends Error {
  constructor(message = "wrong password or damaged container") {
    super(`Decryption failed: ${message}`);
    this.name = "DecryptionError";
  }
}

/** The errno code of a Node system error, if `err` is one. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** Map a Node errno failure on `path` to the pipeline's error taxonomy. */
export function classifyFsError(err: unknown, path: string): Error {
  switch (errnoCode(err)) {
    case "ENOENT":
      return new TransientIOError(path, "file vanished");
    case "ENOSPC":
      return new DiskFullError(path);
    case "EACCES":
    case "EPERM":
      return new PermissionError(path);
    default:
      return err instanceof Error ? err : new Error(String(err));
  }
}
