import { formatError } from "../errors.js";
import type { HarnessLogger } from "../logging/logger.js";
import type { ClosedResult, Endpoint, StreamConnection, StreamTransport } from "../transport/types.js";
import { sleep } from "../util/sleep.js";
import type { MetricsAggregator } from "./metrics-aggregator.js";
import type { WorkerPhase, WorkerStatus } from "./connection-state.js";
import { createInitialWorkerStatus } from "./connection-state.js";

/** Mutable version of WorkerStatus for internal state tracking */
interface MutableWorkerStatus {
  id: number;
  phase: WorkerPhase;
  attempts: number;
  lastError: string | null;
  launchedAt: number | null;
}

export interface ConnectionWorkerOptions {
  readonly id: number;
  readonly endpoint: Endpoint;
  readonly transport: StreamTransport;
  readonly metrics: MetricsAggregator;
  readonly backoffMs: number;
  readonly signal: AbortSignal;
  readonly logger: HarnessLogger;
  /** Called once per received message. A throw is logged and the loop carries on. */
  readonly onMessage?: (data: string, workerId: number) => void;
  readonly onPhaseChange?: (status: WorkerStatus) => void;
  readonly now?: () => number;
}

export interface ConnectionWorker {
  readonly id: number;
  /** Runs until the signal aborts. Repeated calls return the same promise. */
  readonly run: () => Promise<void>;
  readonly getStatus: () => WorkerStatus;
}

/**
 * One simulated client: connect, consume until the stream closes, back off,
 * reconnect. Every attempt lands in the shared metrics. A worker always makes
 * at least one attempt, even when shutdown was requested before it launched;
 * shutdown aborts an attempt still in progress, which counts as an error.
 */
export function createConnectionWorker(
  options: ConnectionWorkerOptions,
): ConnectionWorker {
  const { id, endpoint, transport, metrics, backoffMs, signal, logger, onMessage, onPhaseChange } =
    options;
  const now = options.now ?? Date.now;

  const status: MutableWorkerStatus = { ...createInitialWorkerStatus(id) };
  let running: Promise<void> | null = null;

  function snapshotStatus(): WorkerStatus {
    return { ...status };
  }

  function transitionTo(phase: WorkerPhase): void {
    if (status.phase === phase) return;
    logger.debug(`Worker ${id}: ${status.phase} → ${phase}`);
    status.phase = phase;
    onPhaseChange?.(snapshotStatus());
  }

  async function connect(): Promise<StreamConnection | null> {
    status.attempts += 1;
    transitionTo("connecting");

    try {
      const connection = await transport.establish(endpoint, signal);
      metrics.recordConnected();
      transitionTo("connected");
      return connection;
    } catch (err: unknown) {
      const msg = formatError(err);
      metrics.recordError();
      status.lastError = msg;
      transitionTo("disconnected");
      logger.debug(`Worker ${id} attempt ${status.attempts} failed: ${msg}`);
      return null;
    }
  }

  function deliver(data: string): void {
    if (!onMessage) return;
    try {
      onMessage(data, id);
    } catch (err: unknown) {
      logger.debug(`Worker ${id} could not handle message: ${formatError(err)}`);
    }
  }

  // Returns null when shutdown ended the session rather than the stream
  async function consume(connection: StreamConnection): Promise<ClosedResult | null> {
    try {
      while (!signal.aborted) {
        const result = await connection.receive(endpoint.receiveTimeoutMs);
        if (result.kind === "closed") return result;
        if (result.kind === "message") {
          metrics.recordMessage();
          deliver(result.data);
        }
      }
      return null;
    } catch (err: unknown) {
      return { kind: "closed", abnormal: true, reason: formatError(err) };
    }
  }

  async function closeQuietly(connection: StreamConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err: unknown) {
      logger.debug(`Worker ${id} close failed: ${formatError(err)}`);
    }
  }

  async function loop(): Promise<void> {
    status.launchedAt = now();

    do {
      const connection = await connect();

      if (connection) {
        const closure = await consume(connection);
        await closeQuietly(connection);

        const abnormal = closure?.abnormal ?? false;
        metrics.recordDisconnected(abnormal);
        if (closure && abnormal) {
          status.lastError = closure.reason;
        }
        transitionTo("disconnected");
        logger.debug(`Worker ${id} disconnected: ${closure?.reason ?? "shutdown"}`);
      }

      if (!signal.aborted) {
        await sleep(backoffMs, signal);
      }
    } while (!signal.aborted);

    transitionTo("stopped");
  }

  return {
    id,
    run: () => {
      if (running === null) {
        running = loop();
      }
      return running;
    },
    getStatus: snapshotStatus,
  };
}
