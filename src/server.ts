import Fastify, { type FastifyInstance } from "fastify";
import type { LogLevel } from "./logging/logger.js";
import type { PoolSupervisor } from "./pool/pool-supervisor.js";
import { registerHealthRoute } from "./routes/health.js";
import { registerMetricsRoutes } from "./routes/metrics.js";

export type PoolView = Pick<PoolSupervisor, "metrics" | "getState" | "getPhaseCounts">;

interface BuildServerDeps {
  readonly pool: PoolView;
  readonly startTime: number;
  readonly logLevel: LogLevel;
}

export async function buildServer(
  deps: BuildServerDeps,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: deps.logLevel,
    },
  });

  registerHealthRoute(app, {
    pool: deps.pool,
    startTime: deps.startTime,
  });

  registerMetricsRoutes(app, {
    pool: deps.pool,
  });

  return app;
}
