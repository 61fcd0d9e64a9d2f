import { describe, it, expect, afterEach } from "vitest";
import { once } from "node:events";
import type { IncomingMessage } from "node:http";
import { createServer, type Server, type Socket } from "node:net";
import { WebSocketServer, type WebSocket } from "ws";
import { createWebSocketTransport } from "./websocket-transport.js";
import { ConnectionFailure } from "../errors.js";
import type { Endpoint } from "./types.js";

function endpointFor(port: number, headers: Record<string, string> = {}): Endpoint {
  return {
    url: `ws://127.0.0.1:${port}/`,
    transport: "websocket",
    connectTimeoutMs: 2_000,
    receiveTimeoutMs: 1_000,
    headers,
  };
}

async function startServer(
  onConnection: (socket: WebSocket, request: IncomingMessage) => void,
): Promise<{ wss: WebSocketServer; port: number }> {
  const wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
  wss.on("connection", onConnection);
  await once(wss, "listening");
  const address = wss.address();
  if (typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return { wss, port: address.port };
}

describe("createWebSocketTransport", () => {
  let wss: WebSocketServer | undefined;

  afterEach(async () => {
    if (wss) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve) => wss?.close(() => resolve()));
    }
    wss = undefined;
  });

  it("receives text frames as messages", async () => {
    const started = await startServer((socket) => {
      socket.send('{"message_type":"heartbeat"}');
      socket.send(Buffer.from("binary payload"));
    });
    wss = started.wss;

    const connection = await createWebSocketTransport().establish(endpointFor(started.port));

    expect(await connection.receive(1_000)).toEqual({
      kind: "message",
      data: '{"message_type":"heartbeat"}',
    });
    expect(await connection.receive(1_000)).toEqual({ kind: "message", data: "binary payload" });
    await connection.close();
  });

  it("treats a normal server close as clean", async () => {
    const started = await startServer((socket) => {
      socket.close(1000, "bye");
    });
    wss = started.wss;

    const connection = await createWebSocketTransport().establish(endpointFor(started.port));

    expect(await connection.receive(1_000)).toEqual({
      kind: "closed",
      abnormal: false,
      reason: "closed with code 1000: bye",
    });
    await connection.close();
  });

  it("treats an error close code as abnormal", async () => {
    const started = await startServer((socket) => {
      socket.close(1011, "internal error");
    });
    wss = started.wss;

    const connection = await createWebSocketTransport().establish(endpointFor(started.port));

    expect(await connection.receive(1_000)).toEqual({
      kind: "closed",
      abnormal: true,
      reason: "closed with code 1011: internal error",
    });
    await connection.close();
  });

  it("treats a dropped socket as abnormal", async () => {
    const started = await startServer((socket) => {
      socket.terminate();
    });
    wss = started.wss;

    const connection = await createWebSocketTransport().establish(endpointFor(started.port));

    expect(await connection.receive(1_000)).toEqual({
      kind: "closed",
      abnormal: true,
      reason: "closed with code 1006",
    });
    await connection.close();
  });

  it("sends configured headers with the handshake", async () => {
    const seen: Array<string | string[] | undefined> = [];
    const started = await startServer((_socket, request) => {
      seen.push(request.headers["x-load-test"]);
    });
    wss = started.wss;

    const connection = await createWebSocketTransport().establish(
      endpointFor(started.port, { "x-load-test": "test-run" }),
    );
    await connection.close();

    expect(seen).toEqual(["test-run"]);
  });

  it("closes the server side when the client closes", async () => {
    const serverClosed: number[] = [];
    const started = await startServer((socket) => {
      socket.on("close", (code) => serverClosed.push(code));
    });
    wss = started.wss;

    const connection = await createWebSocketTransport().establish(endpointFor(started.port));
    await connection.close();
    await connection.close();

    expect(await connection.receive(1_000)).toEqual({
      kind: "closed",
      abnormal: false,
      reason: "closed by client",
    });
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(serverClosed).toEqual([1000]);
  });

  it("rejects with ConnectionFailure when nothing listens", async () => {
    const started = await startServer(() => {});
    await new Promise<void>((resolve) => started.wss.close(() => resolve()));

    await expect(
      createWebSocketTransport().establish(endpointFor(started.port)),
    ).rejects.toBeInstanceOf(ConnectionFailure);
  });

  it("abandons a handshake the server never answers when aborted", async () => {
    const held: Socket[] = [];
    const silent: Server = createServer((socket) => {
      held.push(socket);
    });
    silent.listen(0, "127.0.0.1");
    await once(silent, "listening");
    const address = silent.address();
    if (address === null || typeof address === "string") {
      throw new Error("expected a TCP address");
    }

    const controller = new AbortController();
    const attempt = createWebSocketTransport().establish(
      endpointFor(address.port),
      controller.signal,
    );
    await once(silent, "connection");
    controller.abort();

    await expect(attempt).rejects.toThrow(
      `Connection to ws://127.0.0.1:${address.port}/ failed: connect aborted`,
    );

    for (const socket of held) {
      socket.destroy();
    }
    silent.close();
    await once(silent, "close");
  });

  it("rejects without connecting when the signal is already aborted", async () => {
    await expect(
      createWebSocketTransport().establish(endpointFor(1), AbortSignal.abort()),
    ).rejects.toBeInstanceOf(ConnectionFailure);
  });
});
