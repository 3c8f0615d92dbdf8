import type { FastifyInstance } from "fastify";
import { createReportController } from "../controllers/reports.controller.js";

export async function reportRoutes(app: FastifyInstance) {
  const controller = createReportController(app);
  const schema = { tags: ["reports"] };

  app.get("/v1/reports/general-ledger", { schema }, controller.generalLedger);
  app.get("/v1/reports/journal", { schema }, controller.journal);
  app.get("/v1/reports/invoice-stats", { schema }, controller.invoiceStats);
  app.get("/v1/reports/top-clients", { schema }, controller.topClients);
  app.get("/v1/reports/period-balance", { schema }, controller.periodBalance);
}
