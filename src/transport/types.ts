export type TransportKind = "websocket" | "sse" | "tcp";

export interface Endpoint {
  readonly url: string;
  readonly transport: TransportKind;
  readonly connectTimeoutMs: number;
  /** Upper bound on a single blocking receive; bounds how late a worker notices shutdown. */
  readonly receiveTimeoutMs: number;
  readonly headers: Readonly<Record<string, string>>;
}

export type ReceiveResult =
  | { readonly kind: "message"; readonly data: string }
  | { readonly kind: "timeout" }
  | { readonly kind: "closed"; readonly abnormal: boolean; readonly reason: string };

export type ClosedResult = Extract<ReceiveResult, { kind: "closed" }>;

export interface StreamConnection {
  readonly receive: (timeoutMs: number) => Promise<ReceiveResult>;
  /** Releases the handle. Safe to call more than once. */
  readonly close: () => Promise<void>;
}

export interface StreamTransport {
  readonly kind: TransportKind;
  /**
   * Resolves once the stream is open; rejects with ConnectionFailure otherwise.
   * An abort on `signal` before the stream opens tears the attempt down and rejects.
   */
  readonly establish: (endpoint: Endpoint, signal?: AbortSignal) => Promise<StreamConnection>;
}
