import { describe, it, expect, vi } from "vitest";
import { createSseTransport } from "./sse-transport.js";
import { ConnectionFailure } from "../errors.js";
import type { Endpoint } from "./types.js";

const endpoint: Endpoint = {
  url: "http://stream.test/events",
  transport: "sse",
  connectTimeoutMs: 2_000,
  receiveTimeoutMs: 1_000,
  headers: { authorization: "Bearer test-secret" },
};

function eventStreamResponse(body: string, status = 200): Response {
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(body));
      controller.close();
    },
  });
  return new Response(stream, {
    status,
    headers: { "content-type": "text/event-stream" },
  });
}

function mockFetch(body: string, status = 200) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
    eventStreamResponse(body, status),
  );
}

describe("createSseTransport", () => {
  it("delivers each event's data as a message", async () => {
    const fetchFn = mockFetch("data: first\n\ndata: second\n\n");
    const connection = await createSseTransport({ fetchFn }).establish(endpoint);

    expect(await connection.receive(1_000)).toEqual({ kind: "message", data: "first" });
    expect(await connection.receive(1_000)).toEqual({ kind: "message", data: "second" });
    await connection.close();
  });

  it("reports the end of the stream as a clean closure", async () => {
    const fetchFn = mockFetch("data: only\n\n");
    const connection = await createSseTransport({ fetchFn }).establish(endpoint);

    expect(await connection.receive(1_000)).toEqual({ kind: "message", data: "only" });
    expect(await connection.receive(1_000)).toEqual({
      kind: "closed",
      abnormal: false,
      reason: "server closed the stream",
    });
    await connection.close();
  });

  it("sends the configured headers", async () => {
    const fetchFn = mockFetch("data: x\n\n");
    const connection = await createSseTransport({ fetchFn }).establish(endpoint);
    await connection.close();

    const headers: unknown = fetchFn.mock.calls[0]?.[1]?.headers;
    expect(headers).toMatchObject({ authorization: "Bearer test-secret" });
  });

  it("rejects with ConnectionFailure on a non-200 response", async () => {
    const fetchFn = mockFetch("", 503);

    await expect(createSseTransport({ fetchFn }).establish(endpoint)).rejects.toBeInstanceOf(
      ConnectionFailure,
    );
  });

  it("rejects with ConnectionFailure when fetch throws", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new TypeError("fetch failed");
    });

    await expect(createSseTransport({ fetchFn }).establish(endpoint)).rejects.toBeInstanceOf(
      ConnectionFailure,
    );
  });

  it("abandons a request with no response when aborted", async () => {
    const fetchFn = vi.fn(
      (_input: string | URL | Request, _init?: RequestInit) => new Promise<Response>(() => {}),
    );
    const controller = new AbortController();

    const attempt = createSseTransport({ fetchFn }).establish(endpoint, controller.signal);
    await vi.waitFor(() => expect(fetchFn).toHaveBeenCalledOnce());
    controller.abort();

    await expect(attempt).rejects.toThrow(
      "Connection to http://stream.test/events failed: connect aborted",
    );
  });
});
