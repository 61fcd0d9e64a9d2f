import type { FastifyInstance } from "fastify";
import type { PoolView } from "../server.js";
import type { StatsResponse } from "../types/protocol.js";
import type { PhaseCounts } from "../pool/connection-state.js";
import { WORKER_PHASES } from "../pool/connection-state.js";
import type { MetricsSnapshot } from "../pool/metrics-aggregator.js";

interface MetricsDeps {
  readonly pool: PoolView;
}

const PROMETHEUS_CONTENT_TYPE = "text/plain; version=0.0.4";

const COUNTERS: ReadonlyArray<{
  readonly name: string;
  readonly help: string;
  readonly field: keyof Pick<
    MetricsSnapshot,
    "connectedTotal" | "disconnectedTotal" | "errorTotal" | "messageTotal"
  >;
}> = [
  { name: "streamload_connected_total", help: "Successful connections.", field: "connectedTotal" },
  { name: "streamload_disconnected_total", help: "Sessions that ended after connecting.", field: "disconnectedTotal" },
  { name: "streamload_errors_total", help: "Failed connects and abnormal disconnects.", field: "errorTotal" },
  { name: "streamload_messages_total", help: "Messages received across all workers.", field: "messageTotal" },
];

export function renderPrometheus(snapshot: MetricsSnapshot, workers: PhaseCounts): string {
  const lines: string[] = [];

  for (const counter of COUNTERS) {
    lines.push(`# HELP ${counter.name} ${counter.help}`);
    lines.push(`# TYPE ${counter.name} counter`);
    lines.push(`${counter.name} ${snapshot[counter.field]}`);
  }

  lines.push("# HELP streamload_workers Workers by phase.");
  lines.push("# TYPE streamload_workers gauge");
  for (const phase of WORKER_PHASES) {
    lines.push(`streamload_workers{phase="${phase}"} ${workers[phase]}`);
  }

  return `${lines.join("\n")}\n`;
}

export function registerMetricsRoutes(
  app: FastifyInstance,
  deps: MetricsDeps,
): void {
  app.get("/stats", async (): Promise<StatsResponse> => deps.pool.metrics.snapshot());

  app.get("/metrics", async (_request, reply) => {
    const body = renderPrometheus(deps.pool.metrics.snapshot(), deps.pool.getPhaseCounts());
    return reply.type(PROMETHEUS_CONTENT_TYPE).send(body);
  });
}
