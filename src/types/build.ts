import type { CompilerArch } from "./function.js";

export type BuildTarget = {
  binaryFilename: string;
  compilerArch: CompilerArch;
};

export type SafetyVerdict = {
  importsExpectedFramework: boolean;
  docMentionsName: boolean;
};

/** Zip built in memory; never written to disk. */
export type PackagedArchive = {
  bytes: Uint8Array;
  entryName: string;
  uncompressedSize: number;
  compressedSize: number;
  durationMs: number;
};
