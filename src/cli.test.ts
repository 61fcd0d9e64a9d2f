import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildCli, collectHeader } from "./cli.js";
import { ConfigError } from "./errors.js";
import type { HarnessConfig } from "./config/harness-config.js";

const ENV_KEYS = [
  "STREAM_URL",
  "STREAM_HEADERS",
  "WORKER_COUNT",
  "STAGGER_MS",
  "STATS_INTERVAL_MS",
  "BACKOFF_MS",
  "GRACE_PERIOD_MS",
  "CONNECT_TIMEOUT_MS",
  "RECEIVE_TIMEOUT_MS",
  "STATS_PORT",
  "STATS_HOST",
  "LOG_LEVEL",
];

describe("buildCli", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  function setup() {
    const runHarness = vi.fn(async (_config: HarnessConfig) => {});
    const program = buildCli({ runHarness }).exitOverride();
    return { program, runHarness };
  }

  function onlyConfig(runHarness: ReturnType<typeof setup>["runHarness"]): HarnessConfig {
    const config = runHarness.mock.calls[0]?.[0];
    if (!config) throw new Error("runHarness was not called");
    return config;
  }

  it("passes positional endpoint and worker count through", async () => {
    const { program, runHarness } = setup();

    await program.parseAsync(["run", "wss://feed.test/stream", "25"], { from: "user" });

    const config = onlyConfig(runHarness);
    expect(config.endpoint.url).toBe("wss://feed.test/stream");
    expect(config.endpoint.transport).toBe("websocket");
    expect(config.pool.workerCount).toBe(25);
  });

  it("maps options onto the config", async () => {
    const { program, runHarness } = setup();

    await program.parseAsync(
      [
        "run",
        "http://feed.test/events",
        "--stagger", "5",
        "--stats-interval", "2000",
        "--backoff", "250",
        "--grace", "100",
        "--receive-timeout", "500",
        "--stats-port", "9464",
        "--log-level", "DEBUG",
      ],
      { from: "user" },
    );

    const config = onlyConfig(runHarness);
    expect(config.endpoint.transport).toBe("sse");
    expect(config.endpoint.receiveTimeoutMs).toBe(500);
    expect(config.pool).toEqual({
      workerCount: 500,
      staggerMs: 5,
      statsIntervalMs: 2_000,
      backoffMs: 250,
      gracePeriodMs: 100,
    });
    expect(config.statsServer).toEqual({ port: 9464, host: "127.0.0.1" });
    expect(config.logLevel).toBe("debug");
  });

  it("collects repeated headers", async () => {
    const { program, runHarness } = setup();

    await program.parseAsync(
      ["run", "--header", "Authorization: Bearer test-secret", "--header", "X-Run:7"],
      { from: "user" },
    );

    expect(onlyConfig(runHarness).endpoint.headers).toEqual({
      authorization: "Bearer test-secret",
      "x-run": "7",
    });
  });

  it("prefers the command line over the environment", async () => {
    process.env["WORKER_COUNT"] = "9";
    process.env["STAGGER_MS"] = "40";
    const { program, runHarness } = setup();

    await program.parseAsync(["run", "ws://feed.test/", "3"], { from: "user" });

    const config = onlyConfig(runHarness);
    expect(config.pool.workerCount).toBe(3);
    expect(config.pool.staggerMs).toBe(40);
  });

  it("rejects an invalid value without running the harness", async () => {
    const { program, runHarness } = setup();

    await expect(
      program.parseAsync(["run", "ws://feed.test/", "lots"], { from: "user" }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(runHarness).not.toHaveBeenCalled();
  });
});

describe("collectHeader", () => {
  it("appends without mutating the previous list", () => {
    const previous = ["a: 1"];
    expect(collectHeader("b: 2", previous)).toEqual(["a: 1", "b: 2"]);
    expect(previous).toEqual(["a: 1"]);
  });
});
