/** Pipeline stages in execution order. */
export const STAGES = ["input", "fetch", "analysis", "resolution", "build", "packaging", "publish"] as const;

export type Stage = (typeof STAGES)[number];

export type ErrorKind = "input" | "analysis" | "resolution" | "build" | "packaging" | "remote" | "cancelled";

const KIND_BY_STAGE: Record<Stage, ErrorKind> = {
  input: "input",
  fetch: "remote",
  analysis: "analysis",
  resolution: "resolution",
  build: "build",
  packaging: "packaging",
  publish: "remote",
};

/**
 * Terminal failure of one pipeline stage. Never retried.
 */
export class PipelineError extends Error {
  readonly stage: Stage;
  readonly kind: ErrorKind;

  constructor(stage: Stage, message: string, opts?: { kind?: ErrorKind; cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = "PipelineError";
    this.stage = stage;
    this.kind = opts?.kind ?? KIND_BY_STAGE[stage];
  }
}

/** Raised by a step that observed the run's abort signal. */
export class CancelledError extends Error {
  constructor(message = "operation cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** True for our own cancellation and for the AbortError Node and the AWS SDK raise. */
export function isCancellation(e: unknown): boolean {
  return e instanceof CancelledError || (e instanceof Error && e.name === "AbortError");
}

/** Wrap anything thrown inside a stage into a PipelineError for that stage. */
export function toPipelineError(stage: Stage, e: unknown, signal?: AbortSignal): PipelineError {
  if (e instanceof PipelineError) return e;
  if (signal?.aborted || isCancellation(e)) {
    return new PipelineError(stage, `${stage} cancelled`, { kind: "cancelled", cause: e });
  }
  return new PipelineError(stage, errorMessage(e), { cause: e });
}
