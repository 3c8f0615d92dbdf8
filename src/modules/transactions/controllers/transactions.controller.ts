import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  deleteTransactionQuerySchema,
  listTransactionsQuerySchema,
  transactionCreateSchema,
  transactionUpdateSchema,
} from "../schemas/transactions.schemas.js";
import {
  createTransaction,
  deleteTransaction,
  getTransaction,
  getTransactionBalance,
  listTransactions,
  updateTransaction,
} from "../services/transactions.service.js";

export function createTransactionController(app: FastifyInstance) {
  return {
    listTransactions: async (request: FastifyRequest) => {
      const query = listTransactionsQuerySchema.parse(request.query);
      return listTransactions(app.ledger, query);
    },

    getTransaction: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getTransaction(app.ledger, params.id);
    },

    getBalance: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getTransactionBalance(app.ledger, params.id);
    },

    createTransaction: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = transactionCreateSchema.parse(request.body);
      return reply.status(201).send(await createTransaction(app.ledger, payload));
    },

    updateTransaction: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = transactionUpdateSchema.parse(request.body);
      return updateTransaction(app.ledger, params.id, payload);
    },

    deleteTransaction: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const query = deleteTransactionQuerySchema.parse(request.query);
      return deleteTransaction(app.ledger, params.id, query);
    },
  };
}
