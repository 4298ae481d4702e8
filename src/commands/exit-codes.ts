import type { ErrorKind } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_ARGS: 2,
  SAFETY_CHECK_FAILED: 3,
  UNSUPPORTED_TARGET: 4,
  BUILD_FAILED: 5,
  REMOTE_FAILED: 6,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const EXIT_BY_KIND: Record<ErrorKind, ExitCode> = {
  input: EXIT.INVALID_ARGS,
  analysis: EXIT.SAFETY_CHECK_FAILED,
  resolution: EXIT.UNSUPPORTED_TARGET,
  build: EXIT.BUILD_FAILED,
  packaging: EXIT.BUILD_FAILED,
  remote: EXIT.REMOTE_FAILED,
  cancelled: EXIT.CANCELLED,
};

export function exitCodeFor(kind: ErrorKind): ExitCode {
  return EXIT_BY_KIND[kind];
}
