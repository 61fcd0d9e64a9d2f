/** A transport could not be established. Absorbed by workers as an error count. */
export class ConnectionFailure extends Error {
  readonly url: string;

  constructor(url: string, reason: string) {
    super(`Connection to ${url} failed: ${reason}`);
    this.name = "ConnectionFailure";
    this.url = url;
  }
}

/** A message consumer could not decode a payload. Never ends a receive loop. */
export class ProtocolDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolDecodeError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
