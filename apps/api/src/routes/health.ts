/**
 * Health Check Routes
 *
 * Liveness and readiness checks.
 */

import type { FastifyInstance } from "fastify";

export interface ReadinessChecks {
  /** Durable store answers */
  database: () => Promise<boolean>;
  /** Remote cache answers; false means the in-memory tier is serving alone */
  cache: () => Promise<boolean>;
}

type CheckState = "ok" | "error";

async function runCheck(check: () => Promise<boolean>): Promise<CheckState> {
  try {
    return (await check()) ? "ok" : "error";
  } catch {
    return "error";
  }
}

export async function healthRoutes(
  fastify: FastifyInstance,
  options: { checks: ReadinessChecks }
): Promise<void> {
  // Liveness check
  fastify.get("/health", async () => {
    return { status: "healthy", timestamp: new Date().toISOString() };
  });

  // Readiness check. The cache degrades to in-memory, so only the database gates readiness
  fastify.get("/health/ready", async (request, reply) => {
    const [database, cache] = await Promise.all([runCheck(options.checks.database), runCheck(options.checks.cache)]);

    const ready = database === "ok";
    const status = !ready ? "unhealthy" : cache === "ok" ? "ok" : "degraded";

    return reply.status(ready ? 200 : 503).send({
      status,
      checks: { database, cache },
      timestamp: new Date().toISOString(),
    });
  });
}
