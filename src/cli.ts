#!/usr/bin/env node

import { Command } from "commander";
import { describeFailure, publish } from "./commands/publish.js";
import { check } from "./commands/check.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./core/reporter.js";

type CommonOpts = {
  relaxed?: boolean;
  dir: string;
  config?: string;
  env?: string;
  format: OutputFormat;
};

/** Abort the run on SIGINT/SIGTERM so the compiler and pending requests stop. */
function cancellationSignal(): AbortSignal {
  const controller = new AbortController();
  const onSignal = (sig: NodeJS.Signals) => {
    if (!controller.signal.aborted) controller.abort(new Error(`received ${sig}`));
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return controller.signal;
}

function fail(format: OutputFormat, payload: { error: string; exitCode: number; [key: string]: unknown }): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", code: "FAILED", ...payload }) + "\n");
  } else {
    console.error(payload.error);
  }
  process.exit(payload.exitCode);
}

const program = new Command();

program
  .name("lambda-publish")
  .description("Build the Go program in a directory and publish it as the code of an existing AWS Lambda")
  .version("0.1.0");

program
  .command("publish", { isDefault: true })
  .description("Build, package and publish a new version of the function")
  .argument("<function>", "Short Lambda name, partial ARN or full ARN")
  .option("-f, --relaxed", "Skip the package-doc and aws-lambda-go import checks")
  .option("--dir <path>", "Directory holding the main package", ".")
  .option("--dry-run", "Build and package, but do not upload")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (name: string, opts: CommonOpts & { dryRun?: boolean }) => {
    const res = await publish({
      name,
      dir: opts.dir,
      relaxed: opts.relaxed,
      dryRun: opts.dryRun,
      configDir: opts.config,
      env: opts.env,
      format: opts.format,
      signal: cancellationSignal(),
    });

    if (!res.ok) {
      const error = opts.format === "human" ? describeFailure(res) : res.error;
      fail(opts.format, { error, stage: res.stage, exitCode: res.exitCode });
    }

    const { report } = res;
    if (opts.format === "jsonl") {
      process.stdout.write(
        JSON.stringify({
          level: "info",
          code: "OK",
          name: report.name,
          target: report.target,
          version: report.version,
          dryRun: report.dryRun,
          steps: report.steps,
        }) + "\n",
      );
    } else if (report.dryRun) {
      console.log(`${report.shortName}: ${report.target.binaryFilename} (linux/${report.target.compilerArch}) packaged, not published`);
    } else {
      console.log(`${report.shortName}: published version ${report.version ?? "unknown"}`);
    }
  });

program
  .command("check")
  .description("Run the pre-flight source checks without building or contacting AWS")
  .argument("<function>", "Short Lambda name, partial ARN or full ARN")
  .option("-f, --relaxed", "Only verify that a main package exists")
  .option("--dir <path>", "Directory holding the main package", ".")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config layer to apply over base.yaml")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (name: string, opts: CommonOpts) => {
    const res = await check({
      name,
      dir: opts.dir,
      relaxed: opts.relaxed,
      configDir: opts.config,
      env: opts.env,
    });

    if (!res.ok) {
      fail(opts.format, { error: res.error, verdict: res.verdict, exitCode: res.exitCode });
    }

    if (opts.format === "jsonl") {
      process.stdout.write(
        JSON.stringify({ level: "info", code: "OK", shortName: res.shortName, files: res.mainFiles, verdict: res.verdict }) + "\n",
      );
    } else {
      console.log(`${res.shortName}: OK (${res.mainFiles.join(", ")})`);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
