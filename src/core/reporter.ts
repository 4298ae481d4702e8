export type OutputFormat = "human" | "jsonl";

export type Level = "error" | "warn" | "info";

export type ReportEvent = {
  level: Level;
  code: string;
  message: string;
  [key: string]: unknown;
};

export interface Reporter {
  emit(event: ReportEvent): void;
  info(code: string, message: string, extra?: Record<string, unknown>): void;
  warn(code: string, message: string, extra?: Record<string, unknown>): void;
  error(code: string, message: string, extra?: Record<string, unknown>): void;
}

type Sink = { write(chunk: string): unknown };

/**
 * Progress output. "human" prints the message alone on stderr, leaving stdout
 * to the compiler; "jsonl" writes one JSON object per event on stdout.
 */
export function createReporter(
  format: OutputFormat,
  sinks: { stdout?: Sink; stderr?: Sink } = {},
): Reporter {
  const stdout = sinks.stdout ?? process.stdout;
  const stderr = sinks.stderr ?? process.stderr;

  const emit = (event: ReportEvent): void => {
    if (format === "jsonl") {
      stdout.write(JSON.stringify(event) + "\n");
    } else {
      stderr.write(event.message + "\n");
    }
  };

  return {
    emit,
    info: (code, message, extra) => emit({ ...extra, level: "info", code, message }),
    warn: (code, message, extra) => emit({ ...extra, level: "warn", code, message }),
    error: (code, message, extra) => emit({ ...extra, level: "error", code, message }),
  };
}

/** Reporter that records events in memory. */
export function createMemoryReporter(): Reporter & { events: ReportEvent[] } {
  const events: ReportEvent[] = [];
  const emit = (event: ReportEvent): void => {
    events.push(event);
  };
  return {
    events,
    emit,
    info: (code, message, extra) => emit({ ...extra, level: "info", code, message }),
    warn: (code, message, extra) => emit({ ...extra, level: "warn", code, message }),
    error: (code, message, extra) => emit({ ...extra, level: "error", code, message }),
  };
}
