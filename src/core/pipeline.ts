import { analyze, type SourceReport } from "../analyzer/safety.js";
import { describeCompression, packBinary } from "../archive/packager.js";
import type { FunctionService } from "../aws/function-service.js";
import { withBuildDir } from "../build/build-dir.js";
import type { Compiler } from "../build/compiler.js";
import { resolveBuildTarget } from "../resolver/build-target.js";
import type { BuildTarget, PackagedArchive } from "../types/build.js";
import type { PublishConfig } from "../types/config.js";
import type { FunctionDescriptor, UpdateCodeResult } from "../types/function.js";
import { PipelineError, toPipelineError, type Stage } from "./errors.js";
import { shortName as toShortName } from "./identifier.js";
import type { Reporter } from "./reporter.js";
import { withTimeout } from "./timeout.js";

export type StepStatus = "ok" | "failed" | "skipped";

export type StepResult = { status: StepStatus; duration_ms: number; error?: string };

export type DeployRequest = {
  /** Function name, partial ARN or full ARN. */
  name: string;
  sourceDir: string;
  /** Skip the doc-mention and framework-import checks. */
  relaxed?: boolean;
  /** Build and package, but do not upload. */
  dryRun?: boolean;
  signal?: AbortSignal;
};

export type DeployReport = {
  name: string;
  shortName: string;
  dryRun: boolean;
  target: BuildTarget;
  archiveBytes: number;
  compression: { uncompressed: number; compressed: number };
  version: string | null;
  revisionId: string | null;
  steps: Partial<Record<Stage, StepResult>>;
};

export type PipelineDeps = {
  functions: FunctionService;
  compiler: Compiler;
  config: PublishConfig;
  reporter: Reporter;
  /** Parent directory for the temporary build directory. */
  tmpRoot?: string;
};

/**
 * Deployment driver: fetch → analyze → resolve → build → package → publish.
 *
 * Stages run strictly in order and the first failure ends the run as a
 * PipelineError naming its stage. Nothing is retried, and nothing is
 * published unless every earlier stage succeeded.
 */
export class DeployPipeline {
  constructor(private readonly deps: PipelineDeps) {}

  async run(req: DeployRequest): Promise<DeployReport> {
    const { config, functions, compiler, reporter } = this.deps;
    const steps: DeployReport["steps"] = {};
    const signal = req.signal;

    const step = async <T>(stage: Stage, fn: () => Promise<T>): Promise<T> => {
      if (signal?.aborted) {
        throw new PipelineError(stage, `${stage} cancelled`, { kind: "cancelled" });
      }
      const start = Date.now();
      try {
        const value = await fn();
        steps[stage] = { status: "ok", duration_ms: Date.now() - start };
        return value;
      } catch (e) {
        const err = toPipelineError(stage, e, signal);
        steps[stage] = { status: "failed", duration_ms: Date.now() - start, error: err.message };
        reporter.error(`${stage.toUpperCase()}_FAILED`, err.message, { stage, kind: err.kind });
        throw err;
      }
    };

    const shortName = await step("input", async () => {
      if (req.name === "") throw new Error("name must be set");
      const short = toShortName(req.name);
      if (short === "") throw new Error(`cannot derive a function name from ${JSON.stringify(req.name)}`);
      return short;
    });

    const descriptor: FunctionDescriptor = await step("fetch", () =>
      withTimeout(config.timeouts.fetch_seconds * 1000, signal, (s) =>
        functions.getFunction(req.name, config.qualifier, s),
      ).catch((e: unknown) => {
        throw prefixOperation("GetFunctionConfiguration", e);
      }),
    );
    reporter.info("FETCHED", `${descriptor.name}: runtime ${descriptor.runtime}, architectures [${descriptor.architectures.join(", ")}]`, {
      runtime: descriptor.runtime,
      architectures: descriptor.architectures,
      revisionId: descriptor.revisionId ?? null,
    });

    const source: SourceReport = await step("analysis", () =>
      analyze({
        sourceDir: req.sourceDir,
        shortName,
        strict: !req.relaxed,
        frameworkImport: config.framework_import,
        exclude: config.exclude,
      }),
    );
    if (req.relaxed) {
      reporter.warn("CHECKS_RELAXED", "safety checks relaxed: only the main package was verified", { files: source.mainFiles });
    }

    const target = await step("resolution", async () =>
      resolveBuildTarget(descriptor, { bootstrapName: config.bootstrap_name }),
    );
    reporter.info("TARGET", `building ${target.binaryFilename} for linux/${target.compilerArch}`, { ...target });

    const archive: PackagedArchive = await withBuildDir(
      async (outDir) => {
        const binary = await step("build", () =>
          compiler.compile({ sourceDir: req.sourceDir, arch: target.compilerArch, outDir, signal }),
        );
        return step("packaging", () => packBinary(binary, target.binaryFilename));
      },
      { tmpRoot: this.deps.tmpRoot },
    );
    reporter.info("PACKAGED", describeCompression(archive), {
      uncompressed: archive.uncompressedSize,
      compressed: archive.compressedSize,
      bytes: archive.bytes.byteLength,
    });

    let published: UpdateCodeResult | null = null;
    if (req.dryRun) {
      steps.publish = { status: "skipped", duration_ms: 0 };
      reporter.info("DRY_RUN", `dry run: ${archive.bytes.byteLength} bytes not uploaded`);
    } else {
      published = await step("publish", () =>
        withTimeout(config.timeouts.update_seconds * 1000, signal, (s) =>
          functions.updateCode(
            { name: req.name, revisionId: descriptor.revisionId, zipFile: archive.bytes, publish: true },
            s,
          ),
        ).catch((e: unknown) => {
          throw prefixOperation("UpdateFunctionCode", e);
        }),
      );
      reporter.info("PUBLISHED", `published ${descriptor.name} version ${published.version ?? "?"}`, {
        version: published.version ?? null,
      });
    }

    return {
      name: req.name,
      shortName,
      dryRun: req.dryRun ?? false,
      target,
      archiveBytes: archive.bytes.byteLength,
      compression: { uncompressed: archive.uncompressedSize, compressed: archive.compressedSize },
      version: published?.version ?? null,
      revisionId: published?.revisionId ?? null,
      steps,
    };
  }
}

/** Name the remote operation on errors that do not already carry it, such as timeouts. */
function prefixOperation(operation: string, e: unknown): unknown {
  if (e instanceof Error && e.name === "TimeoutError") {
    return new Error(`${operation}: ${e.message}`, { cause: e });
  }
  return e;
}
