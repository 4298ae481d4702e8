import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { parseGoHeader, type GoFileHeader } from "./go-source.js";
import type { SafetyVerdict } from "../types/build.js";

export const DEFAULT_FRAMEWORK_IMPORT = "github.com/aws/aws-lambda-go/lambda";

export type InspectOptions = {
  sourceDir: string;
  /** Function name with any qualifying prefix already removed. */
  shortName: string;
  strict: boolean;
  frameworkImport?: string;
  /** Glob patterns matched against file names; matching files are not scanned. */
  exclude?: string[];
};

export type SourceReport = {
  /** Files of package main, sorted. */
  mainFiles: string[];
  /** Null when strict checks were not requested. */
  verdict: SafetyVerdict | null;
};

/** A safety check that failed; the message tells the user how to bypass it. */
export class SafetyCheckError extends Error {
  constructor(
    readonly check: keyof SafetyVerdict,
    message: string,
  ) {
    super(message);
    this.name = "SafetyCheckError";
  }
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Regular files, and symlinks that resolve to one, as `go build` reads both. */
async function isGoFile(sourceDir: string, entry: Dirent): Promise<boolean> {
  if (!entry.name.endsWith(".go")) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  const target = await fs.stat(path.join(sourceDir, entry.name)).catch((e: unknown) => {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  });
  return target?.isFile() ?? false;
}

async function readHeaders(sourceDir: string, exclude: string[]): Promise<GoFileHeader[]> {
  const entries = await fs.readdir(sourceDir, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (exclude.some((pattern) => minimatch(entry.name, pattern))) continue;
    if (await isGoFile(sourceDir, entry)) names.push(entry.name);
  }
  names.sort();

  const headers: GoFileHeader[] = [];
  for (const name of names) {
    const source = await fs.readFile(path.join(sourceDir, name), "utf8");
    headers.push(parseGoHeader(source, name));
  }
  return headers;
}

/**
 * Read the top-level declarations of every Go file in `sourceDir` and, when
 * strict, compute the safety verdict for package main. Fails only when the
 * directory cannot be read or parsed, or has no main package.
 */
export async function inspectSource(opts: InspectOptions): Promise<SourceReport> {
  if (opts.shortName === "") {
    throw new Error("inspectSource called with an empty function name");
  }

  const headers = await readHeaders(opts.sourceDir, opts.exclude ?? []);
  const main = headers.filter((h) => h.packageName === "main");
  if (main.length === 0) {
    throw new Error("cannot find main package");
  }

  const mainFiles = main.map((h) => h.fileName);
  if (!opts.strict) {
    return { mainFiles, verdict: null };
  }

  const nameRegex = new RegExp(`\\b${escapeRegExp(opts.shortName)}\\b`);
  const frameworkImport = opts.frameworkImport ?? DEFAULT_FRAMEWORK_IMPORT;

  return {
    mainFiles,
    verdict: {
      docMentionsName: main.some((h) => h.doc !== null && nameRegex.test(h.doc)),
      importsExpectedFramework: main.some((h) => h.imports.some((i) => i.path === frameworkImport)),
    },
  };
}

/** Throw a SafetyCheckError for the first failed check of a report. */
export function enforceVerdict(report: SourceReport, shortName: string, frameworkImport = DEFAULT_FRAMEWORK_IMPORT): void {
  const verdict = report.verdict;
  if (!verdict) return;
  if (!verdict.docMentionsName) {
    throw new SafetyCheckError(
      "docMentionsName",
      `package docs does not mention name ${JSON.stringify(shortName)} (run with -f to skip this check)`,
    );
  }
  if (!verdict.importsExpectedFramework) {
    throw new SafetyCheckError(
      "importsExpectedFramework",
      `package does not import ${JSON.stringify(frameworkImport)} dependency (run with -f to skip this check)`,
    );
  }
}

/** Inspect and enforce in one call. */
export async function analyze(opts: InspectOptions): Promise<SourceReport> {
  const report = await inspectSource(opts);
  enforceVerdict(report, opts.shortName, opts.frameworkImport);
  return report;
}
