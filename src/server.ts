import { buildApp } from "./app.js";
import { parseEnv, resolveLogLevel, resolveTrustProxy } from "./config/env.js";
import { createStore } from "./store/index.js";

async function start() {
  const env = parseEnv(process.env);

  const app = await buildApp({
    logLevel: resolveLogLevel(env),
    allowedOrigins: env.ALLOWED_ORIGINS.split(",").map((o) => o.trim()),
    rateLimitMax: env.RATE_LIMIT_MAX,
    trustProxy: resolveTrustProxy(env.TRUST_PROXY),
    store: (log) => createStore(env, log),
    settings: {
      taxRate: env.TAX_RATE,
      invoiceNumberPrefix: env.INVOICE_NUMBER_PREFIX,
      allowTransactionCascadeDelete: env.ALLOW_TRANSACTION_CASCADE_DELETE,
    },
  });

  const close = async (signal: string) => {
    app.log.info(`Shutting down (${signal})`);
    // onClose hook of the ledger plugin closes the store
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void close("SIGINT");
  });

  process.on("SIGTERM", () => {
    void close("SIGTERM");
  });

  await app.listen({
    port: env.PORT,
    host: env.HOST,
  });

  app.log.info(`API listening on ${env.HOST}:${env.PORT}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
