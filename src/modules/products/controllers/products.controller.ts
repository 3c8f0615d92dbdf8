import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  listProductsQuerySchema,
  productCodeParamsSchema,
  productCreateSchema,
  productUpdateSchema,
  stockAdjustmentSchema,
} from "../schemas/products.schemas.js";
import {
  adjustStock,
  createProduct,
  deleteProduct,
  getProduct,
  getProductByCode,
  getProductPrice,
  listLowStock,
  listProducts,
  productStats,
  updateProduct,
} from "../services/products.service.js";

export function createProductController(app: FastifyInstance) {
  return {
    listProducts: async (request: FastifyRequest) => {
      const query = listProductsQuerySchema.parse(request.query);
      return listProducts(app.ledger, query);
    },

    getProduct: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getProduct(app.ledger, params.id);
    },

    getProductByCode: async (request: FastifyRequest) => {
      const params = productCodeParamsSchema.parse(request.params);
      return getProductByCode(app.ledger, params.code);
    },

    getProductPrice: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getProductPrice(app.ledger, params.id);
    },

    createProduct: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = productCreateSchema.parse(request.body);
      return reply.status(201).send(await createProduct(app.ledger, payload));
    },

    updateProduct: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = productUpdateSchema.parse(request.body);
      return updateProduct(app.ledger, params.id, payload);
    },

    adjustStock: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = stockAdjustmentSchema.parse(request.body);
      return adjustStock(app.ledger, params.id, payload);
    },

    listLowStock: async () => listLowStock(app.ledger),

    productStats: async () => productStats(app.ledger),

    deleteProduct: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return deleteProduct(app.ledger, params.id);
    },
  };
}
