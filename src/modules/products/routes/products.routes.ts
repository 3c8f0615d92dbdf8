import type { FastifyInstance } from "fastify";
import { createProductController } from "../controllers/products.controller.js";

export async function productRoutes(app: FastifyInstance) {
  const controller = createProductController(app);
  const schema = { tags: ["products"] };

  app.get("/v1/products", { schema }, controller.listProducts);
  app.get("/v1/products/stats", { schema }, controller.productStats);
  app.get("/v1/products/low-stock", { schema }, controller.listLowStock);
  app.get("/v1/products/by-code/:code", { schema }, controller.getProductByCode);
  app.get("/v1/products/:id", { schema }, controller.getProduct);
  app.get("/v1/products/:id/price", { schema }, controller.getProductPrice);
  app.post("/v1/products", { schema }, controller.createProduct);
  app.patch("/v1/products/:id", { schema }, controller.updateProduct);
  app.post("/v1/products/:id/stock", { schema }, controller.adjustStock);
  app.delete("/v1/products/:id", { schema }, controller.deleteProduct);
}
