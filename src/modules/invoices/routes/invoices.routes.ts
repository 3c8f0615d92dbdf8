import type { FastifyInstance } from "fastify";
import { createInvoiceController } from "../controllers/invoices.controller.js";

export async function invoiceRoutes(app: FastifyInstance) {
  const controller = createInvoiceController(app);
  const schema = { tags: ["invoices"] };

  app.get("/v1/invoices", { schema }, controller.listInvoices);
  app.get("/v1/invoices/:id", { schema }, controller.getInvoice);
  app.get("/v1/invoices/by-number/:invoiceNumber", { schema }, controller.getInvoiceByNumber);
  app.post("/v1/invoices", { schema }, controller.createInvoice);
  app.patch("/v1/invoices/:id", { schema }, controller.updateInvoice);
  app.delete("/v1/invoices/:id", { schema }, controller.deleteInvoice);

  // Every line mutation recomputes the invoice totals in the same unit of work.
  app.get("/v1/invoices/:id/lines", { schema }, controller.listLines);
  app.post("/v1/invoices/:id/lines", { schema }, controller.addLine);
  app.patch("/v1/invoices/:id/lines/:lineId", { schema }, controller.updateLine);
  app.delete("/v1/invoices/:id/lines/:lineId", { schema }, controller.removeLine);
}
