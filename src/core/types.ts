/**
 * Pipeline data model.
 */

export type CompressionLevel = "default" | "fast" | "none";

export type EncryptionAlgorithm = "None" | "AES";

/** Ledger entry for one monitored path, written only after a full delivery. */
export interface FileRecord {
  hash: string;
  lastSentAt: string;
  deliverySucceeded: boolean;
  forwardSucceeded: boolean | null;
  encrypted: boolean;
  encryptionAlgorithm: EncryptionAlgorithm;
  sequenceId: number;
  originalSize: number;
  processedSize: number;
  processingTimeMs: number;
  uploadBytesPerSec: number;
  parts: number;
}

export interface ArchiveSpec {
  compression: CompressionLevel;
  encrypt: boolean;
  passphrase: string;
}

/** Transportable file produced from a source file. */
export interface Artifact {
  path: string;
  /** True when the archiver created the file and it may be deleted. */
  scratch: boolean;
  encrypted: boolean;
  size: number;
}

export type Outcome = "skipped" | "delivered" | "failed";

export interface CandidateResult {
  path: string;
  outcome: Outcome;
  reason?: string;
  sequenceId?: number;
}

/** Summary returned from one scan cycle. */
export interface CycleReport {
  startedAt: string;
  candidates: number;
  delivered: number;
  skipped: number;
  failed: number;
  results: CandidateResult[];
}

/** Time source threaded through everything that waits. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
