import type { FastifyInstance } from "fastify";
import { createTransactionController } from "../controllers/transactions.controller.js";

export async function transactionRoutes(app: FastifyInstance) {
  const controller = createTransactionController(app);
  const schema = { tags: ["transactions"] };

  app.get("/v1/transactions", { schema }, controller.listTransactions);
  app.get("/v1/transactions/:id", { schema }, controller.getTransaction);
  app.get("/v1/transactions/:id/balance", { schema }, controller.getBalance);
  app.post("/v1/transactions", { schema }, controller.createTransaction);
  app.patch("/v1/transactions/:id", { schema }, controller.updateTransaction);
  app.delete("/v1/transactions/:id", { schema }, controller.deleteTransaction);
}
