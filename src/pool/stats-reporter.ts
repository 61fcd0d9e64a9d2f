import { formatError } from "../errors.js";
import type { HarnessLogger } from "../logging/logger.js";
import type { MetricsAggregator, MetricsSnapshot } from "./metrics-aggregator.js";

export interface StatsSample {
  readonly elapsedMs: number;
  readonly connectedTotal: number;
  readonly disconnectedTotal: number;
  readonly errorTotal: number;
  readonly messageTotal: number;
  /** Messages per second since the previous sample. */
  readonly rate: number;
}

export interface StatsReporterOptions {
  readonly metrics: MetricsAggregator;
  readonly intervalMs: number;
  readonly logger: HarnessLogger;
  readonly write: (line: string) => void;
}

export interface StatsReporter {
  readonly start: () => void;
  readonly stop: () => void;
  /** Takes a snapshot and advances the baseline. Null until any counter has moved. */
  readonly sample: () => StatsSample | null;
  /** One reporting cycle: sample, then write the line. */
  readonly tick: () => void;
}

export function computeRate(previous: MetricsSnapshot, current: MetricsSnapshot): number {
  const seconds = (current.takenAt - previous.takenAt) / 1000;
  if (seconds <= 0) return 0;
  return (current.messageTotal - previous.messageTotal) / seconds;
}

export function formatStatsLine(sample: StatsSample): string {
  const elapsed = (sample.elapsedMs / 1000).toFixed(0);
  return (
    `[${elapsed}s] Connected: ${sample.connectedTotal}` +
    ` | Disconnected: ${sample.disconnectedTotal}` +
    ` | Errors: ${sample.errorTotal}` +
    ` | Messages: ${sample.messageTotal}` +
    ` | Rate: ${sample.rate.toFixed(1)}/s`
  );
}

export function createStatsReporter(options: StatsReporterOptions): StatsReporter {
  const { metrics, intervalMs, logger, write } = options;

  let previous = metrics.snapshot();
  let timer: ReturnType<typeof setInterval> | null = null;

  function sample(): StatsSample | null {
    const current = metrics.snapshot();
    const rate = computeRate(previous, current);
    previous = current;

    if (!metrics.hasActivity()) return null;

    return {
      elapsedMs: current.takenAt - (current.startTime ?? current.takenAt),
      connectedTotal: current.connectedTotal,
      disconnectedTotal: current.disconnectedTotal,
      errorTotal: current.errorTotal,
      messageTotal: current.messageTotal,
      rate,
    };
  }

  function tick(): void {
    const next = sample();
    if (next === null) return;

    try {
      write(formatStatsLine(next));
    } catch (err: unknown) {
      logger.warn(`Stats output failed: ${formatError(err)}`);
    }
  }

  return {
    start: () => {
      if (timer !== null) return;
      previous = metrics.snapshot();
      timer = setInterval(tick, intervalMs);
    },

    stop: () => {
      if (timer === null) return;
      clearInterval(timer);
      timer = null;
    },

    sample,
    tick,
  };
}
