import type { FastifyInstance } from "fastify";
import { createAccountController } from "../controllers/accounts.controller.js";

export async function accountRoutes(app: FastifyInstance) {
  const controller = createAccountController(app);
  const schema = { tags: ["accounts"] };

  app.get("/v1/accounts", { schema }, controller.listAccounts);
  app.get("/v1/accounts/:id", { schema }, controller.getAccount);
  app.post("/v1/accounts", { schema }, controller.createAccount);
  app.patch("/v1/accounts/:id", { schema }, controller.updateAccount);
  app.delete("/v1/accounts/:id", { schema }, controller.deleteAccount);
}
