/**
 * URL Shortener API Service
 *
 * Process entry point: loads configuration, wires the store, cache and
 * generator into a LinkService, and serves it over HTTP.
 *
 * Endpoints:
 *   POST   /shorten        - Create a short link
 *   GET    /:code          - Redirect to the long URL
 *   GET    /stats/:code    - Click statistics
 *   DELETE /:code          - Delete a short link
 *   GET    /health         - Liveness check
 *   GET    /health/ready   - Readiness check
 */

import { createTieredCache } from "@urlkit/cache";
import { PostgresLinkRepository, asQueryable, createPool } from "@urlkit/db";
import { createLogger } from "@urlkit/logger";
import { DigestShortCodeGenerator } from "@urlkit/shared";
import { loadConfig, validateConfig } from "./config.js";
import { buildServer } from "./server.js";
import { LinkService } from "./services/index.js";

const logger = createLogger("api");

async function start(): Promise<void> {
  const config = loadConfig();
  for (const warning of validateConfig(config)) {
    logger.warn(warning);
  }

  const pool = createPool({
    connectionString: config.databaseUrl,
    max: config.dbPoolMax,
    logger: createLogger("db", { level: config.logLevel }),
  });
  const repository = new PostgresLinkRepository(asQueryable(pool), createLogger("db", { level: config.logLevel }));
  await repository.init();

  const cache = createTieredCache({
    redisUrl: config.redisUrl,
    commandTimeout: config.redisTimeoutMs,
    fallbackTtlSeconds: config.cacheTtlSeconds,
    logger: createLogger("cache", { level: config.logLevel }),
  });

  const service = new LinkService({
    repository,
    cache,
    generator: new DigestShortCodeGenerator(),
    baseUrl: config.baseUrl,
    codeLength: config.shortCodeLength,
    cacheTtlSeconds: config.cacheTtlSeconds,
    logger: createLogger("links", { level: config.logLevel }),
  });

  const app = await buildServer({
    service,
    readiness: {
      database: () => repository.ping(),
      cache: () => cache.ping(),
    },
    production: config.nodeEnv === "production",
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
  });

  // ==========================================================================
  // Graceful Shutdown
  // ==========================================================================

  let shuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");

    try {
      await app.close();
      logger.info("HTTP server closed");

      const drained = await service.drain();
      logger.info({ drained }, "Background tasks drained");

      await cache.disconnect();
      logger.info("Cache disconnected");

      await pool.end();
      logger.info("Database pool closed");

      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

  await app.listen({ port: config.port, host: config.host });
  logger.info({ baseUrl: config.baseUrl, cache: cache.hasPrimary ? "redis" : "memory" }, "URL shortener API listening");
}

start().catch((err: unknown) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
