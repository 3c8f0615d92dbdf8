import type { FastifyInstance } from "fastify";

export async function registerRequestLogger(app: FastifyInstance): Promise<void> {
  app.addHook("onResponse", (request, reply, done) => {
    const logData = {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      duration: Math.round(reply.elapsedTime),
      userAgent: request.headers["user-agent"] ?? "unknown",
    };

    // Skip logging health checks at info level
    if (request.url === "/health") {
      app.log.debug(logData, "request completed");
    } else if (reply.statusCode >= 500) {
      app.log.error(logData, "request failed");
    } else if (reply.statusCode >= 400) {
      app.log.warn(logData, "request rejected");
    } else {
      app.log.info(logData, "request completed");
    }

    done();
  });
}
