import type { PoolConfig } from "./config/harness-config.js";
import type { HarnessLogger } from "./logging/logger.js";
import { createMessageQueue } from "./transport/message-queue.js";
import type { Endpoint, StreamConnection, StreamTransport } from "./transport/types.js";

export interface RecordingLogger extends HarnessLogger {
  readonly lines: string[];
}

export function createSilentLogger(): HarnessLogger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (msg) => lines.push(`debug: ${msg}`),
    info: (msg) => lines.push(`info: ${msg}`),
    warn: (msg) => lines.push(`warn: ${msg}`),
    error: (msg) => lines.push(`error: ${msg}`),
  };
}

export function createTestEndpoint(overrides: Partial<Endpoint> = {}): Endpoint {
  return {
    url: "ws://stream.test/feed",
    transport: "websocket",
    connectTimeoutMs: 1_000,
    receiveTimeoutMs: 100,
    headers: {},
    ...overrides,
  };
}

export function createTestPoolConfig(overrides: Partial<PoolConfig> = {}): PoolConfig {
  return {
    workerCount: 3,
    staggerMs: 0,
    statsIntervalMs: 5_000,
    backoffMs: 1_000,
    gracePeriodMs: 5_000,
    ...overrides,
  };
}

export interface FakeConnection extends StreamConnection {
  readonly emit: (data: string) => void;
  readonly drop: (abnormal: boolean, reason: string) => void;
  readonly isClosed: () => boolean;
}

export interface FakeTransportOptions {
  /** Return an error to fail the given attempt (1-based), or null to connect. */
  readonly failWith?: (attempt: number) => Error | null;
  /** Establish stays pending until the attempt is aborted. */
  readonly hang?: boolean;
  /** With `hang`, ignore the abort too, so establish never settles. */
  readonly ignoreAbort?: boolean;
}

export interface FakeTransport extends StreamTransport {
  readonly connections: FakeConnection[];
  readonly attempts: () => number;
}

export function createFakeTransport(options: FakeTransportOptions = {}): FakeTransport {
  const connections: FakeConnection[] = [];
  let attempts = 0;

  function openConnection(): FakeConnection {
    const queue = createMessageQueue();
    let closed = false;
    return {
      receive: (timeoutMs) => queue.next(timeoutMs),
      close: async () => {
        closed = true;
        queue.end(false, "closed by client");
      },
      emit: (data) => queue.push(data),
      drop: (abnormal, reason) => queue.end(abnormal, reason),
      isClosed: () => closed,
    };
  }

  return {
    kind: "websocket",
    connections,
    attempts: () => attempts,
    establish: async (_endpoint, signal) => {
      attempts += 1;
      if (signal?.aborted) {
        throw new Error("connect aborted");
      }
      if (options.hang) {
        return new Promise<StreamConnection>((_resolve, reject) => {
          if (options.ignoreAbort) return;
          signal?.addEventListener("abort", () => reject(new Error("connect aborted")), {
            once: true,
          });
        });
      }
      const failure = options.failWith?.(attempts) ?? null;
      if (failure) {
        throw failure;
      }
      const connection = openConnection();
      connections.push(connection);
      return connection;
    },
  };
}
