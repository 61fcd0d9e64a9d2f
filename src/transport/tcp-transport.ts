import { connect } from "node:net";
import { ConnectionFailure } from "../errors.js";
import { createMessageQueue } from "./message-queue.js";
import type { Endpoint, StreamConnection, StreamTransport } from "./types.js";

const DEFAULT_MAX_LINE_LENGTH = 1024 * 1024;

export interface TcpTransportOptions {
  readonly highWaterMark?: number;
  /** A line longer than this ends the connection as abnormal. */
  readonly maxLineLength?: number;
}

export interface TcpAddress {
  readonly host: string;
  readonly port: number;
}

export function parseTcpAddress(url: string): TcpAddress {
  const parsed = new URL(url);
  const port = Number(parsed.port);

  if (parsed.protocol !== "tcp:" || !Number.isInteger(port) || port < 1) {
    throw new ConnectionFailure(url, "expected tcp://<host>:<port>");
  }

  // IPv6 literals keep their brackets in URL.hostname
  const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1");
  return { host, port };
}

/** Newline-delimited stream over raw TCP. Blank lines are keep-alives and are skipped. */
export function createTcpTransport(
  options: TcpTransportOptions = {},
): StreamTransport {
  const maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;

  function establish(endpoint: Endpoint, signal?: AbortSignal): Promise<StreamConnection> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new ConnectionFailure(endpoint.url, "connect aborted"));
        return;
      }

      let address: TcpAddress;
      try {
        address = parseTcpAddress(endpoint.url);
      } catch (err: unknown) {
        reject(err);
        return;
      }

      const socket = connect({ host: address.host, port: address.port });
      socket.setEncoding("utf8");

      const queue = createMessageQueue({
        highWaterMark: options.highWaterMark,
        onPause: () => socket.pause(),
        onResume: () => socket.resume(),
      });
      let opened = false;
      let closing = false;
      let partial = "";

      const connectTimer = setTimeout(() => {
        socket.destroy(new Error(`connect timed out after ${endpoint.connectTimeoutMs}ms`));
      }, endpoint.connectTimeoutMs);

      const onAbort = () => socket.destroy(new Error("connect aborted"));
      signal?.addEventListener("abort", onAbort, { once: true });

      function pushLine(line: string): void {
        const trimmed = line.endsWith("\r") ? line.slice(0, -1) : line;
        if (trimmed.trim() !== "") {
          queue.push(trimmed);
        }
      }

      const connection: StreamConnection = {
        receive: (timeoutMs) => queue.next(timeoutMs),
        close: () =>
          new Promise<void>((resolveClose) => {
            closing = true;
            queue.end(false, "closed by client");
            if (socket.destroyed) {
              resolveClose();
              return;
            }
            socket.once("close", () => resolveClose());
            socket.destroy();
          }),
      };

      socket.once("connect", () => {
        opened = true;
        clearTimeout(connectTimer);
        signal?.removeEventListener("abort", onAbort);
        resolve(connection);
      });

      socket.on("data", (chunk: string) => {
        partial += chunk;
        let newline = partial.indexOf("\n");
        while (newline !== -1) {
          pushLine(partial.slice(0, newline));
          partial = partial.slice(newline + 1);
          newline = partial.indexOf("\n");
        }

        if (partial.length > maxLineLength) {
          partial = "";
          queue.end(true, `line exceeds ${maxLineLength} characters`);
          socket.destroy();
        }
      });

      socket.on("end", () => {
        pushLine(partial);
        partial = "";
        queue.end(false, "server closed the stream");
      });

      socket.on("error", (err) => {
        clearTimeout(connectTimer);
        signal?.removeEventListener("abort", onAbort);
        if (!opened) {
          reject(new ConnectionFailure(endpoint.url, err.message));
          return;
        }
        queue.end(!closing, err.message);
      });

      socket.on("close", () => {
        clearTimeout(connectTimer);
        signal?.removeEventListener("abort", onAbort);
        if (!opened) {
          reject(new ConnectionFailure(endpoint.url, "socket closed before connecting"));
          return;
        }
        queue.end(!closing, "socket closed");
      });
    });
  }

  return { kind: "tcp", establish };
}
