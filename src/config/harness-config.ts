import { ConfigError } from "../errors.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/logger.js";
import type { Endpoint, TransportKind } from "../transport/types.js";

export interface PoolConfig {
  readonly workerCount: number;
  /** Pause between successive worker launches. */
  readonly staggerMs: number;
  readonly statsIntervalMs: number;
  /** Minimum wait before a worker retries. */
  readonly backoffMs: number;
  /** Bounded wait for workers to stop before they are abandoned. */
  readonly gracePeriodMs: number;
}

export interface StatsServerConfig {
  readonly port: number;
  readonly host: string;
}

export interface HarnessConfig {
  readonly endpoint: Endpoint;
  readonly pool: PoolConfig;
  readonly logLevel: LogLevel;
  readonly statsServer: StatsServerConfig | null;
}

/** Raw string values from the command line. Each one overrides its environment variable. */
export interface ConfigInput {
  readonly endpoint?: string;
  readonly workerCount?: string;
  readonly staggerMs?: string;
  readonly statsIntervalMs?: string;
  readonly backoffMs?: string;
  readonly gracePeriodMs?: string;
  readonly connectTimeoutMs?: string;
  readonly receiveTimeoutMs?: string;
  readonly statsPort?: string;
  readonly statsHost?: string;
  readonly logLevel?: string;
  readonly headers?: readonly string[];
}

export const DEFAULT_ENDPOINT = "ws://localhost:8080/";

const SCHEME_TRANSPORTS: Readonly<Record<string, TransportKind>> = {
  "ws:": "websocket",
  "wss:": "websocket",
  "http:": "sse",
  "https:": "sse",
  "tcp:": "tcp",
};

const INTEGER_RE = /^\d+$/;

function readInteger(
  name: string,
  raw: string,
  min: number,
  max: number,
): number {
  const trimmed = raw.trim();
  const value = INTEGER_RE.test(trimmed) ? Number(trimmed) : Number.NaN;

  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new ConfigError(
      `Invalid ${name}: "${raw}". Must be an integer between ${min} and ${max}.`,
    );
  }

  return value;
}

export function transportKindForUrl(url: string): TransportKind {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigError(`Invalid endpoint: "${url}". Must be an absolute URL.`);
  }

  const kind = SCHEME_TRANSPORTS[parsed.protocol];

  if (kind === undefined) {
    throw new ConfigError(
      `Invalid endpoint: "${url}". Scheme must be one of: ${Object.keys(SCHEME_TRANSPORTS).join(", ")}`,
    );
  }

  if (kind === "tcp" && parsed.port === "") {
    throw new ConfigError(`Invalid endpoint: "${url}". tcp:// endpoints need a port.`);
  }

  return kind;
}

export function parseHeaders(
  entries: readonly string[],
): Readonly<Record<string, string>> {
  const headers: Record<string, string> = {};

  for (const entry of entries) {
    const separator = entry.indexOf(":");
    const name = separator > 0 ? entry.slice(0, separator).trim() : "";

    if (name === "") {
      throw new ConfigError(`Invalid header: "${entry}". Use "<name>: <value>".`);
    }

    headers[name.toLowerCase()] = entry.slice(separator + 1).trim();
  }

  return headers;
}

export function loadConfig(input: ConfigInput = {}): HarnessConfig {
  const env = process.env;
  const pick = (cliValue: string | undefined, envName: string, fallback: string): string =>
    cliValue ?? env[envName] ?? fallback;

  const url = pick(input.endpoint, "STREAM_URL", DEFAULT_ENDPOINT);
  const transport = transportKindForUrl(url);

  const rawLogLevel = pick(input.logLevel, "LOG_LEVEL", "info").toLowerCase();

  if (!isLogLevel(rawLogLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: "${rawLogLevel}". Must be one of: ${LOG_LEVELS.join(", ")}`,
    );
  }

  const rawStatsPort = input.statsPort ?? env["STATS_PORT"];
  const statsServer: StatsServerConfig | null =
    rawStatsPort === undefined || rawStatsPort === ""
      ? null
      : {
          port: readInteger("STATS_PORT", rawStatsPort, 1, 65535),
          host: pick(input.statsHost, "STATS_HOST", "127.0.0.1"),
        };

  const headerEntries = [
    ...(env["STREAM_HEADERS"] ?? "").split(";").filter((h) => h.trim() !== ""),
    ...(input.headers ?? []),
  ];

  return {
    endpoint: {
      url,
      transport,
      connectTimeoutMs: readInteger(
        "CONNECT_TIMEOUT_MS",
        pick(input.connectTimeoutMs, "CONNECT_TIMEOUT_MS", "10000"),
        1,
        600_000,
      ),
      receiveTimeoutMs: readInteger(
        "RECEIVE_TIMEOUT_MS",
        pick(input.receiveTimeoutMs, "RECEIVE_TIMEOUT_MS", "1000"),
        1,
        60_000,
      ),
      headers: parseHeaders(headerEntries),
    },
    pool: {
      workerCount: readInteger(
        "WORKER_COUNT",
        pick(input.workerCount, "WORKER_COUNT", "500"),
        0,
        100_000,
      ),
      staggerMs: readInteger(
        "STAGGER_MS",
        pick(input.staggerMs, "STAGGER_MS", "20"),
        0,
        60_000,
      ),
      statsIntervalMs: readInteger(
        "STATS_INTERVAL_MS",
        pick(input.statsIntervalMs, "STATS_INTERVAL_MS", "5000"),
        100,
        3_600_000,
      ),
      backoffMs: readInteger(
        "BACKOFF_MS",
        pick(input.backoffMs, "BACKOFF_MS", "1000"),
        1,
        3_600_000,
      ),
      gracePeriodMs: readInteger(
        "GRACE_PERIOD_MS",
        pick(input.gracePeriodMs, "GRACE_PERIOD_MS", "5000"),
        0,
        600_000,
      ),
    },
    logLevel: rawLogLevel,
    statsServer,
  };
}
