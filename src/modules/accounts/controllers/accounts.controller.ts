import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  accountCreateSchema,
  accountUpdateSchema,
  listAccountsQuerySchema,
} from "../schemas/accounts.schemas.js";
import {
  createAccount,
  deleteAccount,
  getAccount,
  listAccounts,
  updateAccount,
} from "../services/accounts.service.js";

export function createAccountController(app: FastifyInstance) {
  return {
    listAccounts: async (request: FastifyRequest) => {
      const query = listAccountsQuerySchema.parse(request.query);
      return listAccounts(app.ledger, query);
    },

    getAccount: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getAccount(app.ledger, params.id);
    },

    createAccount: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = accountCreateSchema.parse(request.body);
      const account = await createAccount(app.ledger, payload);
      return reply.status(201).send(account);
    },

    updateAccount: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = accountUpdateSchema.parse(request.body);
      return updateAccount(app.ledger, params.id, payload);
    },

    deleteAccount: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return deleteAccount(app.ledger, params.id);
    },
  };
}
