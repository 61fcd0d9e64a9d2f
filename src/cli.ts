import { Command } from "commander";
import { loadConfig, type HarnessConfig } from "./config/harness-config.js";

const VERSION = "0.1.0";

interface RunOptions {
  readonly stagger?: string;
  readonly statsInterval?: string;
  readonly backoff?: string;
  readonly grace?: string;
  readonly connectTimeout?: string;
  readonly receiveTimeout?: string;
  readonly header: string[];
  readonly statsPort?: string;
  readonly statsHost?: string;
  readonly logLevel?: string;
}

export interface CliDeps {
  readonly runHarness: (config: HarnessConfig) => Promise<void>;
}

export function collectHeader(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function buildCli(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("streamload")
    .description("Hold many concurrent stream connections open and report what they see")
    .version(VERSION);

  program
    .command("run")
    .description("Start the worker pool and run until interrupted")
    .argument("[endpoint]", "ws://, wss://, http://, https:// or tcp:// URL (env STREAM_URL)")
    .argument("[worker_count]", "number of concurrent workers (env WORKER_COUNT)")
    .option("--stagger <ms>", "delay between worker launches (env STAGGER_MS)")
    .option("--stats-interval <ms>", "stats line period (env STATS_INTERVAL_MS)")
    .option("--backoff <ms>", "wait before a worker reconnects (env BACKOFF_MS)")
    .option("--grace <ms>", "how long shutdown waits for workers (env GRACE_PERIOD_MS)")
    .option("--connect-timeout <ms>", "connect deadline (env CONNECT_TIMEOUT_MS)")
    .option("--receive-timeout <ms>", "longest single receive wait (env RECEIVE_TIMEOUT_MS)")
    .option("--header <name:value>", "request header, repeatable", collectHeader, [])
    .option("--stats-port <port>", "serve /health, /stats and /metrics (env STATS_PORT)")
    .option("--stats-host <host>", "stats server bind address (env STATS_HOST)")
    .option("--log-level <level>", "silent, error, warn, info or debug (env LOG_LEVEL)")
    .action(
      async (
        endpoint: string | undefined,
        workerCount: string | undefined,
        options: RunOptions,
      ) => {
        const config = loadConfig({
          endpoint,
          workerCount,
          staggerMs: options.stagger,
          statsIntervalMs: options.statsInterval,
          backoffMs: options.backoff,
          gracePeriodMs: options.grace,
          connectTimeoutMs: options.connectTimeout,
          receiveTimeoutMs: options.receiveTimeout,
          statsPort: options.statsPort,
          statsHost: options.statsHost,
          logLevel: options.logLevel,
          headers: options.header,
        });
        await deps.runHarness(config);
      },
    );

  return program;
}
