/**
 * Fastify application factory.
 *
 * Builds the HTTP surface around a LinkService without listening, so tests
 * drive it through `inject`.
 */

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import { isShortenerError } from "@urlkit/shared";
import { errorResponse, messageForCode, statusForCode } from "./errors.js";
import type { LinkService } from "./services/index.js";
import { healthRoutes, type ReadinessChecks } from "./routes/health.js";
import { linksRoutes } from "./routes/links.js";

export interface BuildServerOptions {
  service: LinkService;
  readiness: ReadinessChecks;
  /** Fastify logger setting (default: true) */
  logger?: FastifyServerOptions["logger"];
  /** Hide internal error messages from responses */
  production?: boolean;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? true,
    requestIdHeader: "x-request-id",
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isShortenerError(error)) {
      const status = statusForCode(error.code);
      if (status >= 500) {
        request.log.error({ err: error }, "Request failed");
      }
      return reply.status(status).send(errorResponse(status, error.message, messageForCode(error.code)));
    }

    // Body parsing and other client errors raised by Fastify itself
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(400).send(errorResponse(400, error.message));
    }

    request.log.error({ err: error }, "Unexpected error");
    const message = options.production ? "Internal server error" : error.message;
    return reply.status(500).send(errorResponse(500, message));
  });

  await app.register(healthRoutes, { checks: options.readiness });
  await app.register(linksRoutes, { service: options.service });

  return app;
}
