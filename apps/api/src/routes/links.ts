/**
 * Link Routes
 *
 * Endpoints:
 *   POST   /shorten          - Create a short link
 *   GET    /stats/:code      - Click statistics
 *   GET    /:code            - Redirect to the long URL
 *   DELETE /:code            - Delete a short link
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { LinkService } from "../services/index.js";
import { errorResponse } from "../errors.js";

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

// Shape only; URL and custom code rules are enforced by the service
const createUrlSchema = z.object({
  url: z.string({ required_error: "URL is required" }),
  customCode: z.string().optional(),
});

interface CodeParams {
  code: string;
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "Invalid request";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

// ============================================================================
// Route Registration
// ============================================================================

export async function linksRoutes(
  fastify: FastifyInstance,
  options: { service: LinkService }
): Promise<void> {
  const { service } = options;

  fastify.post("/shorten", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = createUrlSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send(errorResponse(400, firstIssue(parsed.error)));
    }

    const result = await service.createShortUrl(parsed.data);
    return reply.status(201).send(result);
  });

  // Registered before /:code so "stats" is never read as a short code
  fastify.get("/stats/:code", async (request: FastifyRequest<{ Params: CodeParams }>, reply: FastifyReply) => {
    const stats = await service.getUrlStats(request.params.code);
    return reply.status(200).send({
      shortCode: stats.shortCode,
      longUrl: stats.longUrl,
      clicks: stats.clicks,
      createdAt: stats.createdAt.toISOString(),
      updatedAt: stats.updatedAt.toISOString(),
    });
  });

  fastify.get("/:code", async (request: FastifyRequest<{ Params: CodeParams }>, reply: FastifyReply) => {
    const longUrl = await service.getOriginalUrl(request.params.code);
    return reply.redirect(301, longUrl);
  });

  fastify.delete("/:code", async (request: FastifyRequest<{ Params: CodeParams }>, reply: FastifyReply) => {
    const deleted = await service.deleteUrl(request.params.code);
    if (!deleted) {
      return reply.status(404).send(errorResponse(404, "Short code not found"));
    }
    return reply.status(204).send();
  });
}
