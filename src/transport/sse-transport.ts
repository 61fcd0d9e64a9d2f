import { EventSource } from "eventsource";
import { ConnectionFailure } from "../errors.js";
import { createMessageQueue } from "./message-queue.js";
import type { Endpoint, StreamConnection, StreamTransport } from "./types.js";

export interface SseTransportOptions {
  readonly fetchFn?: typeof fetch;
  readonly highWaterMark?: number;
}

/**
 * Server-Sent Events transport. The event source's built-in reconnection is
 * cut off by closing it on the first error; retrying is the worker's job.
 */
export function createSseTransport(
  options: SseTransportOptions = {},
): StreamTransport {
  const fetchFn = options.fetchFn ?? fetch;

  function establish(endpoint: Endpoint, signal?: AbortSignal): Promise<StreamConnection> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConnectionFailure(endpoint.url, "connect aborted"));
        return;
      }

      const source = new EventSource(endpoint.url, {
        fetch: (input, init) =>
          fetchFn(input, {
            ...init,
            headers: { ...init?.headers, ...endpoint.headers },
          }),
      });
      const queue = createMessageQueue({ highWaterMark: options.highWaterMark });
      let opened = false;

      const onAbort = () => {
        clearTimeout(connectTimer);
        source.close();
        reject(new ConnectionFailure(endpoint.url, "connect aborted"));
      };

      const connectTimer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        source.close();
        reject(
          new ConnectionFailure(
            endpoint.url,
            `no response within ${endpoint.connectTimeoutMs}ms`,
          ),
        );
      }, endpoint.connectTimeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });

      const connection: StreamConnection = {
        receive: (timeoutMs) => queue.next(timeoutMs),
        close: async () => {
          clearTimeout(connectTimer);
          queue.end(false, "closed by client");
          source.close();
        },
      };

      source.onopen = () => {
        opened = true;
        clearTimeout(connectTimer);
        signal?.removeEventListener("abort", onAbort);
        resolve(connection);
      };

      source.onmessage = (event) => {
        queue.push(String(event.data));
      };

      source.onerror = (event) => {
        source.close();
        clearTimeout(connectTimer);
        signal?.removeEventListener("abort", onAbort);

        const detail =
          event.message ?? (event.code === undefined ? undefined : `HTTP ${event.code}`);

        if (!opened) {
          reject(new ConnectionFailure(endpoint.url, detail ?? "stream unavailable"));
          return;
        }

        queue.end(detail !== undefined, detail ?? "server closed the stream");
      };
    });
  }

  return { kind: "sse", establish };
}
