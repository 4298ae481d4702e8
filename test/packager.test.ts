import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { unzipSync } from "fflate";
import { readZipEntries } from "../src/archive/inspect.js";
import { describeCompression, packBinary, PackagingError } from "../src/archive/packager.js";
import { makeTmpDir } from "./helpers.js";

describe("archive packager", () => {
  let dir: string;
  let binary: string;
  let content: Buffer;

  beforeEach(() => {
    dir = makeTmpDir("lambda-publish-pack-");
    binary = path.join(dir, "main");
    content = Buffer.from("\x7fELF fake executable body ".repeat(2000), "latin1");
    fs.writeFileSync(binary, content, { mode: 0o600 });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("stores exactly one executable entry under the resolved name", async () => {
    const archive = await packBinary(binary, "bootstrap");
    const entries = readZipEntries(archive.bytes);

    expect(entries).toHaveLength(1);
    expect(entries[0].name).toBe("bootstrap");
    expect(entries[0].method).toBe(8);
    expect(entries[0].hostOs).toBe(3);
    expect(entries[0].mode).toBe(0o100775);
    expect(entries[0].uncompressedSize).toBe(content.length);
  });

  it("round-trips the executable bytes", async () => {
    const archive = await packBinary(binary, "bootstrap");
    const files = unzipSync(archive.bytes);

    expect(Object.keys(files)).toEqual(["bootstrap"]);
    expect(Buffer.from(files.bootstrap).equals(content)).toBe(true);
  });

  it("reports sizes from the archive", async () => {
    const archive = await packBinary(binary, "main");
    expect(archive.entryName).toBe("main");
    expect(archive.uncompressedSize).toBe(content.length);
    expect(archive.compressedSize).toBeLessThan(content.length);
    expect(archive.bytes.byteLength).toBeGreaterThan(archive.compressedSize);
  });

  it("keeps the file modification time", async () => {
    const mtime = new Date(2024, 0, 2, 3, 4, 6);
    fs.utimesSync(binary, mtime, mtime);
    const archive = await packBinary(binary, "bootstrap");
    expect(readZipEntries(archive.bytes)[0].modified.getTime()).toBe(mtime.getTime());
  });

  it("yields the same content when packing twice", async () => {
    const first = unzipSync((await packBinary(binary, "bootstrap")).bytes);
    const second = unzipSync((await packBinary(binary, "bootstrap")).bytes);
    expect(Buffer.from(first.bootstrap).equals(Buffer.from(second.bootstrap))).toBe(true);
  });

  it("packs an empty file", async () => {
    fs.writeFileSync(binary, "");
    const archive = await packBinary(binary, "bootstrap");
    expect(unzipSync(archive.bytes).bootstrap).toHaveLength(0);
  });

  it("fails on a missing file", async () => {
    const missing = path.join(dir, "nope");
    await expect(packBinary(missing, "bootstrap")).rejects.toThrow(PackagingError);
    await expect(packBinary(missing, "bootstrap")).rejects.toThrow(`read ${missing}: `);
  });

  it("fails on a directory", async () => {
    await expect(packBinary(dir, "bootstrap")).rejects.toThrow(`${dir} is not a regular file`);
  });

  it("fails on an empty entry name", async () => {
    await expect(packBinary(binary, "")).rejects.toThrow("archive entry name must be set");
  });

  it("describes the compression achieved", () => {
    const line = describeCompression({
      bytes: new Uint8Array(0),
      entryName: "bootstrap",
      uncompressedSize: 4 * 1024 * 1024,
      compressedSize: 1024 * 1024,
      durationMs: 12,
    });
    expect(line).toBe("compressed from 4.0M to 1.0M in 12ms, compression ratio: 0.25");
  });
});

describe("readZipEntries", () => {
  it("rejects bytes that are not a zip", () => {
    expect(() => readZipEntries(new Uint8Array(64))).toThrow("end of central directory not found");
  });

  it("rejects input shorter than an end record", () => {
    expect(() => readZipEntries(new Uint8Array(4))).toThrow("end of central directory not found");
  });
});
