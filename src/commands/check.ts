import path from "node:path";
import { enforceVerdict, inspectSource } from "../analyzer/safety.js";
import { loadConfig } from "../config/loader.js";
import { errorMessage } from "../core/errors.js";
import { shortName as toShortName } from "../core/identifier.js";
import type { SafetyVerdict } from "../types/build.js";
import type { PublishConfig } from "../types/config.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type CheckOpts = {
  name: string;
  dir?: string;
  relaxed?: boolean;
  configDir?: string;
  env?: string;
  config?: PublishConfig;
};

export type CheckResult =
  | { ok: true; shortName: string; mainFiles: string[]; verdict: SafetyVerdict | null }
  | { ok: false; error: string; exitCode: ExitCode; verdict: SafetyVerdict | null };

/**
 * Run the pre-flight source checks alone, without contacting AWS.
 */
export async function check(opts: CheckOpts): Promise<CheckResult> {
  let config: PublishConfig;
  try {
    config = opts.config ?? loadConfig(opts.env, opts.configDir);
  } catch (e) {
    return { ok: false, error: errorMessage(e), exitCode: EXIT.INVALID_ARGS, verdict: null };
  }

  if (opts.name === "") {
    return { ok: false, error: "name must be set", exitCode: EXIT.INVALID_ARGS, verdict: null };
  }
  const shortName = toShortName(opts.name);
  if (shortName === "") {
    return {
      ok: false,
      error: `cannot derive a function name from ${JSON.stringify(opts.name)}`,
      exitCode: EXIT.INVALID_ARGS,
      verdict: null,
    };
  }

  try {
    const report = await inspectSource({
      sourceDir: path.resolve(opts.dir ?? "."),
      shortName,
      strict: !opts.relaxed,
      frameworkImport: config.framework_import,
      exclude: config.exclude,
    });
    try {
      enforceVerdict(report, shortName, config.framework_import);
    } catch (e) {
      return { ok: false, error: errorMessage(e), exitCode: EXIT.SAFETY_CHECK_FAILED, verdict: report.verdict };
    }
    return { ok: true, shortName, mainFiles: report.mainFiles, verdict: report.verdict };
  } catch (e) {
    return { ok: false, error: errorMessage(e), exitCode: EXIT.SAFETY_CHECK_FAILED, verdict: null };
  }
}
