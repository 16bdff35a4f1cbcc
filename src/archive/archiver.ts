/**
 * Turns a source file into one transportable artifact: zip, optionally sealed.
 */
import { once } from "node:events";
import { createReadStream, createWriteStream } from "node:fs";
import { rm, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import { finished } from "node:stream/promises";
import { Zip, ZipDeflate, type DeflateOptions } from "fflate";
import { ConfigError, EncryptionConfigError, classifyFsError } from "../core/exceptions.js";
import type { ArchiveSpec, Artifact } from "../core/types.js";
import { SEALED_SUFFIX, sealFile } from "./seal.js";

export const ZIP_SUFFIX = ".zip";

export function assertArchiveSpec(spec: ArchiveSpec): void {
  if (spec.encrypt && spec.compression === "none") {
    throw new ConfigError("encryption cannot be enabled when compression is 'none'");
  }
  if (spec.encrypt && !spec.passphrase) {
    throw new EncryptionConfigError();
  }
}

/** False when the source itself is delivered untouched. */
export function needsContainer(sourcePath: string, spec: ArchiveSpec): boolean {
  if (spec.compression === "none") return false;
  if (sourcePath.toLowerCase().endsWith(ZIP_SUFFIX) && !spec.encrypt) return false;
  return true;
}

/** Stream `sourcePath` into a single-entry zip at `zipPath`. */
async function writeZip(
  sourcePath: string,
  entryName: string,
  zipPath: string,
  level: DeflateOptions["level"],
): Promise<void> {
  const out = createWriteStream(zipPath, { flags: "wx" });
  const pending: Uint8Array[] = [];
  let failure: Error | null = null;
  out.on("error", (err) => {
    failure = err;
  });

  const zip = new Zip((err, chunk) => {
    if (err) failure = err;
    else pending.push(chunk);
  });
  const entry = new ZipDeflate(entryName, { level });
  zip.add(entry);

  const flush = async (): Promise<void> => {
    if (failure) throw failure;
    for (const chunk of pending.splice(0)) {
      if (!out.write(chunk)) await once(out, "drain");
    }
  };

  try {
    for await (const chunk of createReadStream(sourcePath)) {
      entry.push(chunk);
      await flush();
    }
    entry.push(new Uint8Array(0), true);
    zip.end();
    await flush();
    out.end();
    await finished(out);
  } catch (err) {
    out.destroy();
    await rm(zipPath, { force: true });
    throw err;
  }
}

/**
 * Build the artifact for `sourcePath`. Created files go to `scratchDir` and
 * are flagged `scratch`; a source delivered as-is never is.
 */
export async function buildArtifact(
  sourcePath: string,
  spec: ArchiveSpec,
  scratchDir: string,
): Promise<Artifact> {
  assertArchiveSpec(spec);
  try {
    if (!needsContainer(sourcePath, spec)) {
      const { size } = await stat(sourcePath);
      return { path: sourcePath, scratch: false, encrypted: false, size };
    }

    const zipPath = join(scratchDir, `${basename(sourcePath)}${ZIP_SUFFIX}`);
    await writeZip(sourcePath, basename(sourcePath), zipPath, spec.compression === "fast" ? 1 : 6);
    if (!spec.encrypt) {
      const { size } = await stat(zipPath);
      return { path: zipPath, scratch: true, encrypted: false, size };
    }

    const sealedPath = `${zipPath}${SEALED_SUFFIX}`;
    await sealFile(zipPath, sealedPath, spec.passphrase);
    await rm(zipPath, { force: true });
    const { size } = await stat(sealedPath);
    return { path: sealedPath, scratch: true, encrypted: true, size };
  } catch (err) {
    throw classifyFsError(err, sourcePath);
  }
}
