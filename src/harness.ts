import type { FastifyInstance } from "fastify";
import type { HarnessConfig } from "./config/harness-config.js";
import { formatError } from "./errors.js";
import { createConsoleLogger, type HarnessLogger } from "./logging/logger.js";
import { createPoolSupervisor, type PoolSummary } from "./pool/pool-supervisor.js";
import { buildServer } from "./server.js";
import { createTransport } from "./transport/transport-factory.js";

const INTERRUPT_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Resolves on the first SIGINT or SIGTERM, or on a fatal process error. */
function waitForInterrupt(logger: HarnessLogger): Promise<string> {
  return new Promise((resolve) => {
    let interrupted = false;

    const interrupt = (reason: string) => {
      if (interrupted) return;
      interrupted = true;
      resolve(reason);
    };

    for (const signal of INTERRUPT_SIGNALS) {
      process.on(signal, () => interrupt(signal));
    }

    process.on("uncaughtException", (err) => {
      logger.error(`FATAL uncaughtException: ${err.stack ?? err.message}`);
      interrupt("uncaughtException");
    });

    process.on("unhandledRejection", (reason) => {
      logger.error(`FATAL unhandledRejection: ${formatError(reason)}`);
      interrupt("unhandledRejection");
    });
  });
}

export async function runHarness(config: HarnessConfig): Promise<PoolSummary> {
  const startTime = Date.now();
  const logger = createConsoleLogger(config.logLevel);

  const supervisor = createPoolSupervisor({
    config: config.pool,
    endpoint: config.endpoint,
    transport: createTransport(config.endpoint.transport),
    logger,
  });

  let app: FastifyInstance | null = null;
  if (config.statsServer) {
    app = await buildServer({
      pool: supervisor,
      startTime,
      logLevel: config.logLevel,
    });
    await app.listen({ port: config.statsServer.port, host: config.statsServer.host });
    logger.info(
      `Stats server listening on http://${config.statsServer.host}:${config.statsServer.port}`,
    );
  }

  const interrupted = waitForInterrupt(logger).then((reason) => {
    logger.info(`Received ${reason}, shutting down...`);
  });

  try {
    return await supervisor.run(interrupted);
  } finally {
    if (app) {
      await app.close();
    }
  }
}
