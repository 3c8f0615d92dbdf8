import type { FastifyInstance } from "fastify";
import { createPeriodController } from "../controllers/periods.controller.js";

export async function periodRoutes(app: FastifyInstance) {
  const controller = createPeriodController(app);
  const schema = { tags: ["periods"] };

  app.get("/v1/periods", { schema }, controller.listPeriods);
  app.get("/v1/periods/:id", { schema }, controller.getPeriod);
  app.post("/v1/periods", { schema }, controller.createPeriod);
  app.patch("/v1/periods/:id", { schema }, controller.updatePeriod);
  app.delete("/v1/periods/:id", { schema }, controller.deletePeriod);
}
