/**
 * Rate limiting middleware for Fastify.
 *
 * Global limit: `max` req/min per client IP (RATE_LIMIT_MAX). Behind a
 * proxy, set TRUST_PROXY so the IP comes from X-Forwarded-For.
 */

import type { FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";

export async function registerRateLimit(app: FastifyInstance, max: number): Promise<void> {
  await app.register(rateLimit, {
    global: true,
    max,
    timeWindow: "1 minute",
    allowList: (request) => request.url === "/health",
    // request.ip already honours forwarded headers when trustProxy is set
    keyGenerator: (request) => request.ip,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: "RATE_LIMITED",
      message: `Rate limit exceeded. Retry after ${context.after}.`,
    }),
  });

  app.log.debug(`[rate-limit] @fastify/rate-limit registered (${max} req/min global)`);
}
