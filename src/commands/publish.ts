import path from "node:path";
import { createLambdaApi, LambdaFunctionService, type FunctionService } from "../aws/function-service.js";
import { GoCompiler, type Compiler } from "../build/compiler.js";
import { loadConfig } from "../config/loader.js";
import { errorMessage, PipelineError, type Stage } from "../core/errors.js";
import { DeployPipeline, type DeployReport } from "../core/pipeline.js";
import { createReporter, type OutputFormat, type Reporter } from "../core/reporter.js";
import type { PublishConfig } from "../types/config.js";
import { EXIT, exitCodeFor, type ExitCode } from "./exit-codes.js";

export type PublishOpts = {
  name: string;
  dir?: string;
  relaxed?: boolean;
  dryRun?: boolean;
  configDir?: string;
  env?: string;
  format?: OutputFormat;
  signal?: AbortSignal;
  /** Collaborators to use instead of the AWS client, `go` and console output. */
  overrides?: {
    config?: PublishConfig;
    functions?: FunctionService;
    compiler?: Compiler;
    reporter?: Reporter;
    tmpRoot?: string;
  };
};

export type PublishResult =
  | { ok: true; report: DeployReport }
  | { ok: false; error: string; stage: Stage | null; exitCode: ExitCode };

const REMOTE_OPERATIONS = ["GetFunctionConfiguration", "UpdateFunctionCode"];

/**
 * Failure line for human output: `<stage>: <message>`, unless the message
 * already starts with the remote operation or the stage name.
 */
export function describeFailure(res: { error: string; stage: Stage | null }): string {
  const { error, stage } = res;
  if (stage === null || error.startsWith(`${stage} `)) return error;
  if (REMOTE_OPERATIONS.some((op) => error.startsWith(`${op}: `))) return error;
  return `${stage}: ${error}`;
}

export async function publish(opts: PublishOpts): Promise<PublishResult> {
  let config: PublishConfig;
  try {
    config = opts.overrides?.config ?? loadConfig(opts.env, opts.configDir);
  } catch (e) {
    return { ok: false, error: errorMessage(e), stage: null, exitCode: EXIT.INVALID_ARGS };
  }

  const reporter = opts.overrides?.reporter ?? createReporter(opts.format ?? "human");
  const pipeline = new DeployPipeline({
    config,
    reporter,
    functions: opts.overrides?.functions ?? new LambdaFunctionService(createLambdaApi(config.aws)),
    compiler: opts.overrides?.compiler ?? new GoCompiler({ command: config.compiler.command, env: config.compiler.env }),
    tmpRoot: opts.overrides?.tmpRoot,
  });

  try {
    const report = await pipeline.run({
      name: opts.name,
      sourceDir: path.resolve(opts.dir ?? "."),
      relaxed: opts.relaxed,
      dryRun: opts.dryRun,
      signal: opts.signal,
    });
    return { ok: true, report };
  } catch (e) {
    if (e instanceof PipelineError) {
      return { ok: false, error: e.message, stage: e.stage, exitCode: exitCodeFor(e.kind) };
    }
    return { ok: false, error: errorMessage(e), stage: null, exitCode: EXIT.FAILED };
  }
}
