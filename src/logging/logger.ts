export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: -1,
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LOG_LEVEL_SET: ReadonlySet<string> = new Set(LOG_LEVELS);

export interface HarnessLogger {
  readonly debug: (msg: string) => void;
  readonly info: (msg: string) => void;
  readonly warn: (msg: string) => void;
  readonly error: (msg: string) => void;
}

export interface LogSink {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

const processSink: LogSink = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVEL_SET.has(value);

/**
 * Console logger with level filtering. Info goes to stdout alongside the
 * stats lines; everything else goes to stderr.
 */
export function createConsoleLogger(
  level: LogLevel,
  sink: LogSink = processSink,
  prefix = "[streamload]",
): HarnessLogger {
  const enabled = (candidate: LogLevel): boolean =>
    LEVEL_ORDER[candidate] <= LEVEL_ORDER[level];

  return {
    debug: (msg) => {
      if (enabled("debug")) sink.stderr(`${prefix} DEBUG: ${msg}`);
    },
    info: (msg) => {
      if (enabled("info")) sink.stdout(`${prefix} ${msg}`);
    },
    warn: (msg) => {
      if (enabled("warn")) sink.stderr(`${prefix} WARN: ${msg}`);
    },
    error: (msg) => {
      if (enabled("error")) sink.stderr(`${prefix} ERROR: ${msg}`);
    },
  };
}
