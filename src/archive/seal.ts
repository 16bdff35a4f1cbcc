/**
 * Passphrase sealing of a container: AES-256-GCM under a scrypt-derived key.
 *
 * Layout: magic (8) | salt (16) | iv (12) | ciphertext | auth tag (16).
 */
import { createCipheriv, createDecipheriv, randomBytes, scrypt } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { open, rm, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { DecryptionError, EncryptionConfigError, classifyFsError } from "../core/exceptions.js";

const MAGIC = Buffer.from("FCSEAL01", "ascii");
const SALT_BYTES = 16;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const KEY_BYTES = 32;
const SCRYPT_PARAMS = { N: 2 ** 15, r: 8, p: 1, maxmem: 64 * 1024 * 1024 };

export const SEAL_HEADER_BYTES = MAGIC.length + SALT_BYTES + IV_BYTES;
export const SEAL_OVERHEAD_BYTES = SEAL_HEADER_BYTES + TAG_BYTES;
export const SEALED_SUFFIX = ".enc";

function deriveKey(passphrase: string, salt: Buffer): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(passphrase, salt, KEY_BYTES, SCRYPT_PARAMS, (err, key) => {
      if (err) reject(err);
      else resolve(key);
    });
  });
}

export async function sealFile(src: string, dst: string, passphrase: string): Promise<void> {
  if (!passphrase) throw new EncryptionConfigError();
  const salt = randomBytes(SALT_BYTES);
  const iv = randomBytes(IV_BYTES);
  const key = await deriveKey(passphrase, salt);
  const cipher = createCipheriv("aes-256-gcm", key, iv);
  cipher.setAAD(MAGIC);
  const header = Buffer.concat([MAGIC, salt, iv]);

  try {
    await pipeline(
      createReadStream(src),
      cipher,
      async function* (source: AsyncIterable<Buffer>) {
        yield header;
        for await (const chunk of source) yield chunk;
        yield cipher.getAuthTag();
      },
      createWriteStream(dst),
    );
  } catch (err) {
    await rm(dst, { force: true });
    throw classifyFsError(err, dst);
  }
}

export async function unsealFile(src: string, dst: string, passphrase: string): Promise<void> {
  if (!passphrase) throw new EncryptionConfigError();
  const { size } = await stat(src);
  if (size < SEAL_OVERHEAD_BYTES) throw new DecryptionError("not a sealed container");

  const header = Buffer.alloc(SEAL_HEADER_BYTES);
  const tag = Buffer.alloc(TAG_BYTES);
  const fd = await open(src, "r");
  try {
    await fd.read(header, 0, SEAL_HEADER_BYTES, 0);
    await fd.read(tag, 0, TAG_BYTES, size - TAG_BYTES);
  } finally {
    await fd.close();
  }
  if (!header.subarray(0, MAGIC.length).equals(MAGIC)) {
    throw new DecryptionError("not a sealed container");
  }

  const salt = header.subarray(MAGIC.length, MAGIC.length + SALT_BYTES);
  const iv = header.subarray(MAGIC.length + SALT_BYTES);
  const key = await deriveKey(passphrase, salt);
  const decipher = createDecipheriv("aes-256-gcm", key, iv);
  decipher.setAAD(MAGIC);
  decipher.setAuthTag(tag);

  const bodyEnd = size - TAG_BYTES - 1;
  const body =
    bodyEnd >= SEAL_HEADER_BYTES
      ? createReadStream(src, { start: SEAL_HEADER_BYTES, end: bodyEnd })
      : Readable.from([]);

  try {
    await pipeline(body, decipher, createWriteStream(dst));
  } catch (err) {
    await rm(dst, { force: true });
    const mapped = classifyFsError(err, dst);
    throw mapped === err ? new DecryptionError() : mapped;
  }
}
