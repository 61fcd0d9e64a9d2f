import type { FastifyInstance } from "fastify";
import type { HealthResponse } from "../types/protocol.js";
import type { PoolView } from "../server.js";

interface HealthDeps {
  readonly pool: PoolView;
  readonly startTime: number;
}

export function registerHealthRoute(
  app: FastifyInstance,
  deps: HealthDeps,
): void {
  app.get("/health", async (): Promise<HealthResponse> => {
    const poolState = deps.pool.getState();
    const workers = deps.pool.getPhaseCounts();
    const total =
      workers.connecting + workers.connected + workers.disconnected + workers.stopped;

    // An empty pool has nothing to connect, so it counts as healthy while running
    const isHealthy =
      poolState === "running" && (total === 0 || workers.connected > 0);

    return {
      status: isHealthy ? "ok" : "degraded",
      poolState,
      workers,
      uptime: Math.round((Date.now() - deps.startTime) / 1000),
    };
  });
}
