/**
 * Streaming content fingerprint.
 */
import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { classifyFsError } from "./exceptions.js";

export const HASH_BLOCK_BYTES = 64 * 1024;

/** SHA-256 of the file's bytes, hex encoded. */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash("sha256");
  try {
    const stream = createReadStream(filePath, { highWaterMark: HASH_BLOCK_BYTES });
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch (err) {
    throw classifyFsError(err, filePath);
  }
  return hash.digest("hex");
}
