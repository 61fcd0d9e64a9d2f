import { WebSocket, type RawData } from "ws";
import { ConnectionFailure } from "../errors.js";
import { createMessageQueue } from "./message-queue.js";
import type { Endpoint, StreamConnection, StreamTransport } from "./types.js";

const CLOSE_HANDSHAKE_TIMEOUT_MS = 1_000;
const CLEAN_CLOSE_CODES: ReadonlySet<number> = new Set([1000, 1001]);

export interface WebSocketTransportOptions {
  readonly highWaterMark?: number;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

function describeClose(code: number, reason: Buffer): string {
  const text = reason.toString("utf8");
  return text === "" ? `closed with code ${code}` : `closed with code ${code}: ${text}`;
}

export function createWebSocketTransport(
  options: WebSocketTransportOptions = {},
): StreamTransport {
  function establish(endpoint: Endpoint, signal?: AbortSignal): Promise<StreamConnection> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConnectionFailure(endpoint.url, "connect aborted"));
        return;
      }

      const ws = new WebSocket(endpoint.url, {
        headers: { ...endpoint.headers },
        handshakeTimeout: endpoint.connectTimeoutMs,
      });
      const queue = createMessageQueue({
        highWaterMark: options.highWaterMark,
        onPause: () => ws.pause(),
        onResume: () => ws.resume(),
      });
      let opened = false;
      let closing = false;

      const onAbort = () => {
        reject(new ConnectionFailure(endpoint.url, "connect aborted"));
        ws.terminate();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      const connection: StreamConnection = {
        receive: (timeoutMs) => queue.next(timeoutMs),

        close: () =>
          new Promise<void>((resolveClose) => {
            closing = true;
            queue.end(false, "closed by client");

            if (ws.readyState === WebSocket.CLOSED) {
              resolveClose();
              return;
            }

            const timer = setTimeout(() => ws.terminate(), CLOSE_HANDSHAKE_TIMEOUT_MS);
            ws.once("close", () => {
              clearTimeout(timer);
              resolveClose();
            });

            if (ws.readyState === WebSocket.OPEN) {
              ws.close(1000, "client shutdown");
            }
          }),
      };

      ws.on("open", () => {
        opened = true;
        signal?.removeEventListener("abort", onAbort);
        resolve(connection);
      });

      ws.on("message", (data) => queue.push(rawDataToString(data)));

      ws.on("error", (err) => {
        if (!opened) {
          signal?.removeEventListener("abort", onAbort);
          reject(new ConnectionFailure(endpoint.url, err.message));
          ws.terminate();
          return;
        }
        queue.end(!closing, err.message);
      });

      ws.on("close", (code, reason) => {
        if (!opened) {
          signal?.removeEventListener("abort", onAbort);
          reject(new ConnectionFailure(endpoint.url, describeClose(code, reason)));
          return;
        }
        const clean = closing || CLEAN_CLOSE_CODES.has(code);
        queue.end(!clean, describeClose(code, reason));
      });
    });
  }

  return { kind: "websocket", establish };
}
