import fs from "node:fs/promises";
import { zipSync } from "fflate";
import type { PackagedArchive } from "../types/build.js";
import { readZipEntries } from "./inspect.js";

/** rwxrwxr-x */
export const ENTRY_PERMISSIONS = 0o775;

const REGULAR_FILE = 0o100000;
const UNIX_HOST = 3;

export class PackagingError extends Error {
  constructor(message: string, opts?: { cause?: unknown }) {
    super(message, opts);
    this.name = "PackagingError";
  }
}

/**
 * Zip one executable in memory under `entryName`, whatever its file name on
 * disk. The entry is deflated at level 9, keeps the file's modification time
 * and is marked rwxrwxr-x regardless of the file's own mode.
 */
export async function packBinary(executablePath: string, entryName: string): Promise<PackagedArchive> {
  if (entryName === "") throw new PackagingError("archive entry name must be set");

  let data: Uint8Array;
  let mtime: Date;
  try {
    const stat = await fs.stat(executablePath);
    if (!stat.isFile()) throw new Error(`${executablePath} is not a regular file`);
    mtime = stat.mtime;
    data = await fs.readFile(executablePath);
  } catch (e) {
    throw new PackagingError(`read ${executablePath}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }

  const begin = Date.now();
  let bytes: Uint8Array;
  try {
    bytes = zipSync({
      [entryName]: [
        data,
        {
          level: 9,
          mtime,
          os: UNIX_HOST,
          attrs: (REGULAR_FILE | ENTRY_PERMISSIONS) * 0x10000,
        },
      ],
    });
  } catch (e) {
    throw new PackagingError(`compress ${entryName}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  const durationMs = Date.now() - begin;

  const entries = readZipEntries(bytes);
  if (entries.length !== 1 || entries[0].name !== entryName) {
    throw new PackagingError(
      `archive must hold exactly one entry named ${JSON.stringify(entryName)}, found [${entries.map((e) => e.name).join(", ")}]`,
    );
  }

  return {
    bytes,
    entryName,
    uncompressedSize: entries[0].uncompressedSize,
    compressedSize: entries[0].compressedSize,
    durationMs,
  };
}

function megabytes(n: number): string {
  return (Math.floor(n / 1024) / 1024).toFixed(1);
}

export function describeCompression(archive: PackagedArchive): string {
  const ratio = archive.uncompressedSize === 0 ? 1 : archive.compressedSize / archive.uncompressedSize;
  return (
    `compressed from ${megabytes(archive.uncompressedSize)}M to ${megabytes(archive.compressedSize)}M ` +
    `in ${archive.durationMs}ms, compression ratio: ${ratio.toFixed(2)}`
  );
}
