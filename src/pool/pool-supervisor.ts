import type { PoolConfig } from "../config/harness-config.js";
import { formatError } from "../errors.js";
import type { HarnessLogger } from "../logging/logger.js";
import type { Endpoint, StreamTransport } from "../transport/types.js";
import { sleep } from "../util/sleep.js";
import type { PhaseCounts, PoolState, WorkerStatus } from "./connection-state.js";
import { countPhases } from "./connection-state.js";
import type { ConnectionWorker } from "./connection-worker.js";
import { createConnectionWorker } from "./connection-worker.js";
import type { MetricsAggregator, MetricsSnapshot } from "./metrics-aggregator.js";
import { createMetricsAggregator } from "./metrics-aggregator.js";
import { createStatsReporter } from "./stats-reporter.js";

const PROGRESS_EVERY = 50;

export interface PoolSummary {
  readonly metrics: MetricsSnapshot;
  readonly elapsedMs: number;
  /** Workers that had not stopped when the grace period ran out. */
  readonly unaccountedWorkers: number;
}

export interface PoolSupervisorOptions {
  readonly config: PoolConfig;
  readonly endpoint: Endpoint;
  readonly transport: StreamTransport;
  readonly logger: HarnessLogger;
  readonly metrics?: MetricsAggregator;
  /** Destination for stats, progress and summary lines. Defaults to stdout. */
  readonly write?: (line: string) => void;
  readonly onMessage?: (data: string, workerId: number) => void;
  readonly onStateChange?: (state: PoolState) => void;
  readonly now?: () => number;
}

export interface PoolSupervisor {
  readonly metrics: MetricsAggregator;
  /** Launches the pool. Resolves once every worker has been launched or stop() cut it short. */
  readonly start: () => Promise<void>;
  /** Shuts the pool down. Repeated calls return the same summary. */
  readonly stop: () => Promise<PoolSummary>;
  readonly run: (interrupt: Promise<unknown>) => Promise<PoolSummary>;
  readonly getState: () => PoolState;
  readonly getWorkerStatuses: () => WorkerStatus[];
  readonly getPhaseCounts: () => PhaseCounts;
}

export function formatSummary(summary: PoolSummary): string[] {
  const { metrics } = summary;
  return [
    "=== Final Stats ===",
    `Total Connected: ${metrics.connectedTotal}`,
    `Total Disconnected: ${metrics.disconnectedTotal}`,
    `Total Errors: ${metrics.errorTotal}`,
    `Total Messages: ${metrics.messageTotal}`,
    `Unaccounted Workers: ${summary.unaccountedWorkers}`,
  ];
}

const stdoutWrite = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

/**
 * Owns the worker pool: staggered launch, the shared shutdown signal, and
 * the bounded wait for workers on the way out.
 * State machine: idle → starting → running → stopping → stopped.
 */
export function createPoolSupervisor(options: PoolSupervisorOptions): PoolSupervisor {
  const { config, endpoint, transport, logger, onMessage, onStateChange } = options;
  const metrics = options.metrics ?? createMetricsAggregator();
  const write = options.write ?? stdoutWrite;
  const now = options.now ?? Date.now;

  const shutdown = new AbortController();
  const workers: ConnectionWorker[] = [];
  const runs: Promise<void>[] = [];
  const reporter = createStatsReporter({
    metrics,
    intervalMs: config.statsIntervalMs,
    logger,
    write,
  });

  let state: PoolState = "idle";
  let startedAt: number | null = null;
  let launching: Promise<void> | null = null;
  let stopping: Promise<PoolSummary> | null = null;

  function transitionTo(next: PoolState): void {
    if (state === next) return;
    logger.debug(`Pool: ${state} → ${next}`);
    state = next;
    onStateChange?.(next);
  }

  function launchWorker(id: number): void {
    const worker = createConnectionWorker({
      id,
      endpoint,
      transport,
      metrics,
      backoffMs: config.backoffMs,
      signal: shutdown.signal,
      logger,
      onMessage,
      now,
    });
    workers.push(worker);
    runs.push(
      worker.run().catch((err: unknown) => {
        logger.error(`Worker ${id} crashed: ${formatError(err)}`);
      }),
    );
  }

  async function launchAll(): Promise<void> {
    const total = config.workerCount;
    transitionTo("starting");
    startedAt = now();
    write(`Starting stress test with ${total} workers`);
    write(`Endpoint: ${endpoint.url} (${endpoint.transport})`);
    reporter.start();

    // Absolute schedule, so slow launches do not push later ones back
    const t0 = now();
    for (let i = 0; i < total; i++) {
      const delay = t0 + i * config.staggerMs - now();
      if (delay > 0) {
        await sleep(delay, shutdown.signal);
      }
      if (shutdown.signal.aborted) break;

      launchWorker(i);
      const launched = i + 1;
      if (launched % PROGRESS_EVERY === 0) {
        write(`Spawned ${launched}/${total} workers...`);
      }
    }

    if (shutdown.signal.aborted) return;

    write(`All ${total} workers spawned. Press Ctrl+C to stop.`);
    transitionTo("running");
  }

  async function waitForWorkers(): Promise<void> {
    const grace = new AbortController();
    await Promise.race([
      Promise.all(runs),
      sleep(config.gracePeriodMs, grace.signal),
    ]);
    grace.abort();
  }

  async function shutDown(): Promise<PoolSummary> {
    shutdown.abort();
    transitionTo("stopping");
    write("Stopping...");

    if (launching) {
      await launching;
    }
    await waitForWorkers();
    reporter.stop();

    const unaccountedWorkers = workers.filter(
      (worker) => worker.getStatus().phase !== "stopped",
    ).length;
    if (unaccountedWorkers > 0) {
      logger.warn(
        `${unaccountedWorkers} workers did not stop within ${config.gracePeriodMs}ms`,
      );
    }

    const summary: PoolSummary = {
      metrics: metrics.snapshot(),
      elapsedMs: startedAt === null ? 0 : now() - startedAt,
      unaccountedWorkers,
    };
    for (const line of formatSummary(summary)) {
      write(line);
    }
    transitionTo("stopped");
    return summary;
  }

  function start(): Promise<void> {
    if (launching === null) {
      launching = state === "idle" ? launchAll() : Promise.resolve();
    }
    return launching;
  }

  function stop(): Promise<PoolSummary> {
    if (stopping === null) {
      stopping = shutDown();
    }
    return stopping;
  }

  return {
    metrics,
    start,
    stop,

    async run(interrupt) {
      const starting = start();
      await interrupt;
      const summary = await stop();
      await starting;
      return summary;
    },

    getState: () => state,
    getWorkerStatuses: () => workers.map((worker) => worker.getStatus()),
    getPhaseCounts: () => countPhases(workers.map((worker) => worker.getStatus())),
  };
}
