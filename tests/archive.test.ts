/**
 * Unit tests for hashing, archiving and sealing.
 */
import { describe, test, expect } from "vitest";
import { createHash } from "node:crypto";
import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { unzipSync } from "fflate";
import { buildArtifact, needsContainer } from "../src/archive/archiver.js";
import { SEAL_OVERHEAD_BYTES, sealFile, unsealFile } from "../src/archive/seal.js";
import {
  ConfigError,
  DecryptionError,
  EncryptionConfigError,
  TransientIOError,
} from "../src/core/exceptions.js";
import { HASH_BLOCK_BYTES, hashFile } from "../src/core/hasher.js";
import type { ArchiveSpec } from "../src/core/types.js";
import { makeTmpDir, noise, writeFile } from "./fixtures.js";

const plain: ArchiveSpec = { compression: "default", encrypt: false, passphrase: "" };
const sealed: ArchiveSpec = { compression: "default", encrypt: true, passphrase: "test-secret" };

describe("hashFile", () => {
  test("matches a one-shot digest across block boundaries", async () => {
    const dir = makeTmpDir();
    const bytes = noise(HASH_BLOCK_BYTES * 2 + 17);
    const path = writeFile(join(dir, "f.bin"), bytes);
    const expected = createHash("sha256").update(bytes).digest("hex");
    expect(await hashFile(path)).toBe(expected);
  });

  test("empty file", async () => {
    const path = writeFile(join(makeTmpDir(), "empty"), "");
    expect(await hashFile(path)).toBe(
      "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  test("vanished file is a transient error", async () => {
    await expect(hashFile(join(makeTmpDir(), "gone"))).rejects.toThrow(TransientIOError);
  });
});

describe("needsContainer", () => {
  test("compression none ships the source", () => {
    expect(needsContainer("/a/report.pdf", { ...plain, compression: "none" })).toBe(false);
  });

  test("an existing zip is not re-zipped unless sealing", () => {
    expect(needsContainer("/a/bundle.ZIP", plain)).toBe(false);
    expect(needsContainer("/a/bundle.zip", sealed)).toBe(true);
    expect(needsContainer("/a/notes.txt", plain)).toBe(true);
  });
});

describe("buildArtifact", () => {
  test("zip holds one entry named after the source", async () => {
    const dir = makeTmpDir();
    const source = writeFile(join(dir, "in", "notes.txt"), "hello hello hello hello");
    const artifact = await buildArtifact(source, plain, dir);

    expect(artifact.path).toBe(join(dir, "notes.txt.zip"));
    expect(artifact.scratch).toBe(true);
    expect(artifact.encrypted).toBe(false);
    expect(artifact.size).toBe(readFileSync(artifact.path).length);

    const entries = unzipSync(new Uint8Array(readFileSync(artifact.path)));
    expect(Object.keys(entries)).toEqual(["notes.txt"]);
    expect(new TextDecoder().decode(entries["notes.txt"])).toBe("hello hello hello hello");
  });

  test("fast compression still round-trips", async () => {
    const dir = makeTmpDir();
    const bytes = noise(5000);
    const source = writeFile(join(dir, "in", "data.bin"), bytes);
    const artifact = await buildArtifact(source, { ...plain, compression: "fast" }, dir);
    const entries = unzipSync(new Uint8Array(readFileSync(artifact.path)));
    expect(entries["data.bin"]).toEqual(bytes);
  });

  test("compression none delivers the source untouched", async () => {
    const dir = makeTmpDir();
    const source = writeFile(join(dir, "raw.txt"), "abc");
    const artifact = await buildArtifact(source, { ...plain, compression: "none" }, dir);
    expect(artifact).toEqual({ path: source, scratch: false, encrypted: false, size: 3 });
  });

  test("sealed container decrypts back to the zip", async () => {
    const dir = makeTmpDir();
    const source = writeFile(join(dir, "in", "secret.txt"), "top secret");
    const artifact = await buildArtifact(source, sealed, dir);

    expect(artifact.path).toBe(join(dir, "secret.txt.zip.enc"));
    expect(artifact.encrypted).toBe(true);
    expect(existsSync(join(dir, "secret.txt.zip"))).toBe(false);

    const zipPath = join(dir, "out.zip");
    await unsealFile(artifact.path, zipPath, "test-secret");
    const entries = unzipSync(new Uint8Array(readFileSync(zipPath)));
    expect(new TextDecoder().decode(entries["secret.txt"])).toBe("top secret");
  });

  test("encryption without compression is a config error", async () => {
    const dir = makeTmpDir();
    const source = writeFile(join(dir, "a.txt"), "x");
    await expect(
      buildArtifact(source, { compression: "none", encrypt: true, passphrase: "test-secret" }, dir),
    ).rejects.toThrow(ConfigError);
  });

  test("encryption without a password", async () => {
    const dir = makeTmpDir();
    const source = writeFile(join(dir, "a.txt"), "x");
    await expect(buildArtifact(source, { ...sealed, passphrase: "" }, dir)).rejects.toThrow(
      EncryptionConfigError,
    );
  });
});

describe("seal / unseal", () => {
  test("adds a fixed overhead", async () => {
    const dir = makeTmpDir();
    const src = writeFile(join(dir, "p"), noise(1000));
    await sealFile(src, join(dir, "p.enc"), "test-secret");
    expect(readFileSync(join(dir, "p.enc")).length).toBe(1000 + SEAL_OVERHEAD_BYTES);
  });

  test("empty input round-trips", async () => {
    const dir = makeTmpDir();
    const src = writeFile(join(dir, "e"), "");
    await sealFile(src, join(dir, "e.enc"), "test-secret");
    await unsealFile(join(dir, "e.enc"), join(dir, "e.out"), "test-secret");
    expect(readFileSync(join(dir, "e.out")).length).toBe(0);
  });

  test("wrong password fails and leaves no output", async () => {
    const dir = makeTmpDir();
    const src = writeFile(join(dir, "p"), "payload");
    await sealFile(src, join(dir, "p.enc"), "test-secret");
    await expect(unsealFile(join(dir, "p.enc"), join(dir, "p.out"), "wrong-secret")).rejects.toThrow(
      DecryptionError,
    );
    expect(existsSync(join(dir, "p.out"))).toBe(false);
  });

  test("tampered container fails", async () => {
    const dir = makeTmpDir();
    const src = writeFile(join(dir, "p"), "payload");
    await sealFile(src, join(dir, "p.enc"), "test-secret");
    const bytes = readFileSync(join(dir, "p.enc"));
    bytes[bytes.length - 20] ^= 0xff;
    writeFileSync(join(dir, "p.enc"), bytes);
    await expect(unsealFile(join(dir, "p.enc"), join(dir, "p.out"), "test-secret")).rejects.toThrow(
      DecryptionError,
    );
  });

  test("not a sealed container", async () => {
    const dir = makeTmpDir();
    const src = writeFile(join(dir, "plain"), noise(100));
    await expect(unsealFile(src, join(dir, "o"), "test-secret")).rejects.toThrow(DecryptionError);
  });

  test("empty password is rejected", async () => {
    const dir = makeTmpDir();
    const src = writeFile(join(dir, "p"), "x");
    await expect(sealFile(src, join(dir, "p.enc"), "")).rejects.toThrow(EncryptionConfigError);
  });
});
