import { spawn } from "node:child_process";
import path from "node:path";
import { CancelledError } from "../core/errors.js";
import type { CompilerArch } from "../types/function.js";

export const TARGET_OS = "linux";

const STDERR_TAIL_BYTES = 8 * 1024;

/** Time a cancelled compiler gets to exit on SIGTERM before it is sent SIGKILL. */
export const DEFAULT_KILL_GRACE_MS = 5_000;

export type CompileRequest = {
  sourceDir: string;
  arch: CompilerArch;
  /** Directory the executable is written to; owned by the caller. */
  outDir: string;
  signal?: AbortSignal;
};

/** Produces one executable for linux/<arch> from a source directory. */
export interface Compiler {
  compile(req: CompileRequest): Promise<string>;
}

export class BuildError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderrTail: string,
  ) {
    super(stderrTail ? `${message}\n${stderrTail}` : message);
    this.name = "BuildError";
  }
}

type Writable = { write(chunk: Buffer): unknown };

/**
 * `go build` for a Lambda: stripped symbols, trimmed paths, GOOS=linux.
 * stdout is inherited; stderr is forwarded as it arrives and its tail kept
 * for the error message.
 */
export class GoCompiler implements Compiler {
  private readonly command: string;
  private readonly extraEnv: Record<string, string>;
  private readonly stderr: Writable;
  private readonly killGraceMs: number;

  constructor(
    opts: { command?: string; env?: Record<string, string>; stderr?: Writable; killGraceMs?: number } = {},
  ) {
    this.command = opts.command ?? "go";
    this.extraEnv = opts.env ?? {};
    this.stderr = opts.stderr ?? process.stderr;
    this.killGraceMs = opts.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  args(outPath: string): string[] {
    return ["build", "-ldflags=-s -w", "-trimpath", "-o", outPath];
  }

  compile(req: CompileRequest): Promise<string> {
    if (req.signal?.aborted) return Promise.reject(new CancelledError("build cancelled"));

    const outPath = path.join(req.outDir, "main");

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.command, this.args(outPath), {
        cwd: req.sourceDir,
        env: { ...process.env, ...this.extraEnv, GOOS: TARGET_OS, GOARCH: req.arch },
        stdio: ["ignore", "inherit", "pipe"],
      });

      let tail = Buffer.alloc(0);
      child.stderr?.on("data", (chunk: Buffer) => {
        this.stderr.write(chunk);
        tail = Buffer.concat([tail, chunk]);
        if (tail.length > STDERR_TAIL_BYTES) tail = tail.subarray(tail.length - STDERR_TAIL_BYTES);
      });

      // On abort: SIGTERM, then SIGKILL after the grace period. The promise
      // settles only once the child has exited.
      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        aborted = true;
        child.kill("SIGTERM");
        killTimer = setTimeout(() => child.kill("SIGKILL"), this.killGraceMs);
      };
      const cleanup = () => {
        clearTimeout(killTimer);
        req.signal?.removeEventListener("abort", onAbort);
      };
      req.signal?.addEventListener("abort", onAbort, { once: true });

      child.once("error", (err) => {
        cleanup();
        reject(new BuildError(`failed to run ${this.command}: ${err.message}`, null, ""));
      });

      child.once("exit", () => {
        cleanup();
        if (aborted) reject(new CancelledError("build cancelled"));
      });

      child.once("close", (code, signal) => {
        if (aborted) return;
        const stderrTail = tail.toString("utf8").trim();
        if (code === 0) {
          resolve(outPath);
        } else if (code === null) {
          reject(new BuildError(`${this.command} build terminated by ${signal ?? "signal"}`, null, stderrTail));
        } else {
          reject(new BuildError(`${this.command} build failed with exit code ${code}`, code, stderrTail));
        }
      });
    });
  }
}
