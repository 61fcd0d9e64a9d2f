export interface MetricsSnapshot {
  readonly connectedTotal: number;
  readonly disconnectedTotal: number;
  readonly errorTotal: number;
  readonly messageTotal: number;
  /** Time of the first recorded event, or null while nothing has happened. */
  readonly startTime: number | null;
  readonly takenAt: number;
}

export interface MetricsAggregator {
  readonly recordConnected: () => void;
  /** An abnormal disconnect also counts as an error. */
  readonly recordDisconnected: (abnormal: boolean) => void;
  readonly recordError: () => void;
  readonly recordMessage: () => void;
  readonly hasActivity: () => boolean;
  readonly snapshot: () => MetricsSnapshot;
}

export interface MetricsAggregatorOptions {
  readonly now?: () => number;
}

/**
 * Shared counters for every worker in the pool. Totals only grow.
 * Increments run to completion on the event loop, so no update is lost.
 */
export function createMetricsAggregator(
  options: MetricsAggregatorOptions = {},
): MetricsAggregator {
  const now = options.now ?? Date.now;

  let connectedTotal = 0;
  let disconnectedTotal = 0;
  let errorTotal = 0;
  let messageTotal = 0;
  let startTime: number | null = null;

  function markStarted(): void {
    if (startTime === null) {
      startTime = now();
    }
  }

  return {
    recordConnected: () => {
      markStarted();
      connectedTotal += 1;
    },

    recordDisconnected: (abnormal) => {
      markStarted();
      disconnectedTotal += 1;
      if (abnormal) {
        errorTotal += 1;
      }
    },

    recordError: () => {
      markStarted();
      errorTotal += 1;
    },

    recordMessage: () => {
      markStarted();
      messageTotal += 1;
    },

    hasActivity: () => startTime !== null,

    snapshot: () =>
      Object.freeze({
        connectedTotal,
        disconnectedTotal,
        errorTotal,
        messageTotal,
        startTime,
        takenAt: now(),
      }),
  };
}
