import type { FastifyInstance } from "fastify";
import { createLedgerEntryController } from "../controllers/ledger-entries.controller.js";

export async function ledgerEntryRoutes(app: FastifyInstance) {
  const controller = createLedgerEntryController(app);
  const schema = { tags: ["ledger-entries"] };

  app.get("/v1/ledger-entries", { schema }, controller.listEntries);
  app.get("/v1/ledger-entries/:id", { schema }, controller.getEntry);
  app.post("/v1/ledger-entries", { schema }, controller.createEntry);
  app.patch("/v1/ledger-entries/:id", { schema }, controller.updateEntry);
  app.delete("/v1/ledger-entries/:id", { schema }, controller.deleteEntry);
}
