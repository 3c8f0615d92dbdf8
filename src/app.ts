import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import helmet from "@fastify/helmet";
import { ZodError } from "zod";
import ledgerPlugin, { type LedgerPluginOptions } from "./plugins/ledger.js";
import { HttpError } from "./utils/errors.js";
import { registerApiRoutes } from "./routes/index.js";
import { registerRateLimit } from "./middleware/rate-limit.js";
import { registerRequestLogger } from "./middleware/request-logger.js";

export interface BuildAppOptions extends LedgerPluginOptions {
  logLevel?: string;
  allowedOrigins?: string[];
  rateLimitMax?: number;
  /** Honour X-Forwarded-For from these proxies when resolving `request.ip`. */
  trustProxy?: boolean | string | string[];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? "info",
    },
    trustProxy: options.trustProxy ?? false,
  });

  // Set before any plugin so every encapsulated route context inherits it
  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof HttpError) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        details: error.details,
      });
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: "Validation failed",
        code: "VALIDATION_ERROR",
        details: error.flatten(),
      });
    }

    const maybeStatusCode = error.statusCode;
    if (maybeStatusCode && maybeStatusCode >= 400 && maybeStatusCode < 500) {
      return reply.status(maybeStatusCode).send({
        error: error.message,
        code: maybeStatusCode === 429 ? "RATE_LIMITED" : "BAD_REQUEST",
      });
    }

    app.log.error(error);
    return reply.status(500).send({ error: "Internal Server Error", code: "INTERNAL" });
  });

  await app.register(cors, {
    origin: options.allowedOrigins ?? ["http://localhost:3000"],
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
      },
    },
    frameguard: { action: "deny" },
    referrerPolicy: { policy: "strict-origin-when-cross-origin" },
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Ledger & Invoicing API",
        version: "0.1.0",
        description: "Double-entry ledger with consistent invoice totals",
      },
      servers: [{ url: "/", description: "Local" }],
      tags: [
        { name: "accounts" },
        { name: "periods" },
        { name: "clients" },
        { name: "products" },
        { name: "transactions" },
        { name: "ledger-entries" },
        { name: "invoices" },
        { name: "reports" },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: "/docs",
  });

  await registerRateLimit(app, options.rateLimitMax ?? 200);

  await app.register(ledgerPlugin, { store: options.store, settings: options.settings });

  await registerRequestLogger(app);

  app.get("/health", async () => ({ ok: true, store: app.ledger.store.driver }));

  await registerApiRoutes(app);

  return app;
}
