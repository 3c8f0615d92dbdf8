import type { FastifyInstance } from "fastify";
import { createClientController } from "../controllers/clients.controller.js";

export async function clientRoutes(app: FastifyInstance) {
  const controller = createClientController(app);
  const schema = { tags: ["clients"] };

  app.get("/v1/clients", { schema }, controller.listClients);
  app.get("/v1/clients/stats", { schema }, controller.clientStats);
  app.get("/v1/clients/by-tax-id/:taxId", { schema }, controller.getClientByTaxId);
  app.get("/v1/clients/:id", { schema }, controller.getClient);
  app.post("/v1/clients", { schema }, controller.createClient);
  app.patch("/v1/clients/:id", { schema }, controller.updateClient);
  app.delete("/v1/clients/:id", { schema }, controller.deleteClient);
}
