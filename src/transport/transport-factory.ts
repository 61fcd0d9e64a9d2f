import { createSseTransport } from "./sse-transport.js";
import { createTcpTransport } from "./tcp-transport.js";
import { createWebSocketTransport } from "./websocket-transport.js";
import type { StreamTransport, TransportKind } from "./types.js";

export function createTransport(kind: TransportKind): StreamTransport {
  switch (kind) {
    case "websocket":
      return createWebSocketTransport();
    case "sse":
      return createSseTransport();
    case "tcp":
      return createTcpTransport();
  }
}
