/**
 * Splits an oversized artifact into numbered parts and joins them back.
 */
import { createReadStream, createWriteStream } from "node:fs";
import { stat } from "node:fs/promises";
import { basename, join } from "node:path";
import { pipeline } from "node:stream/promises";
import { SEALED_SUFFIX } from "./seal.js";

/** Stays under the Bot API's 50 MB upload ceiling. */
export const MAX_CHUNK_BYTES = 45 * 1024 * 1024;

export interface ChunkFile {
  path: string;
  index: number;
  total: number;
  size: number;
}

export function partCount(size: number, maxBytes: number): number {
  return Math.ceil(size / maxBytes);
}

export function partFileName(base: string, index: number): string {
  return `${base}.${String(index).padStart(3, "0")}`;
}

/**
 * Yields parts in order, writing each one into `outDir` only when the
 * consumer asks for it.
 */
export async function* splitArtifact(
  artifactPath: string,
  outDir: string,
  maxBytes: number = MAX_CHUNK_BYTES,
): AsyncGenerator<ChunkFile> {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${maxBytes}`);
  }
  const { size } = await stat(artifactPath);
  const total = partCount(size, maxBytes);
  const base = basename(artifactPath);

  for (let index = 1; index <= total; index++) {
    const start = (index - 1) * maxBytes;
    const end = Math.min(size, start + maxBytes) - 1;
    const path = join(outDir, partFileName(base, index));
    await pipeline(createReadStream(artifactPath, { start, end }), createWriteStream(path));
    yield { path, index, total, size: end - start + 1 };
  }
}

/** Concatenate `parts` in the given order into `target`; returns bytes written. */
export async function joinParts(parts: string[], target: string): Promise<number> {
  const out = createWriteStream(target);
  let written = 0;
  await pipeline(async function* () {
    for (const part of parts) {
      for await (const chunk of createReadStream(part)) {
        written += chunk.length;
        yield chunk;
      }
    }
  }, out);
  return written;
}

/** Plain-text recipe for putting a split container back together. */
export function reassemblyInstructions(
  containerName: string,
  total: number,
  encrypted: boolean,
): string {
  const lines = [
    "To reassemble the file:",
    `1. Download all parts (${total} in total)`,
    "2. Use one of the following commands:",
    "   # Windows",
    `   copy /b ${containerName}.* ${containerName}`,
    "",
    "   # Linux/Mac",
    `   cat ${containerName}.* > ${containerName}`,
  ];

  if (encrypted) {
    const zipName = containerName.endsWith(SEALED_SUFFIX)
      ? containerName.slice(0, -SEALED_SUFFIX.length)
      : containerName;
    lines.push(
      `3. Decrypt: file-courier unseal ${containerName} --out ${zipName}`,
      `4. Extract ${zipName}`,
      "",
      "The container is encrypted. You'll need the password to decrypt it.",
    );
  } else if (containerName.toLowerCase().endsWith(".zip")) {
    lines.push(`3. Extract ${containerName}`, "", "The ZIP file is not encrypted.");
  } else {
    lines.push("", "The file is not compressed or encrypted.");
  }
  return lines.join("\n");
}
