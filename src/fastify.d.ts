import type { LedgerContext } from "./types.js";

declare module "fastify" {
  interface FastifyInstance {
    ledger: LedgerContext;
  }
}
