import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  clientCreateSchema,
  clientUpdateSchema,
  listClientsQuerySchema,
  taxIdParamsSchema,
} from "../schemas/clients.schemas.js";
import {
  clientStats,
  createClient,
  deleteClient,
  getClient,
  getClientByTaxId,
  listClients,
  updateClient,
} from "../services/clients.service.js";

export function createClientController(app: FastifyInstance) {
  return {
    listClients: async (request: FastifyRequest) => {
      const query = listClientsQuerySchema.parse(request.query);
      return listClients(app.ledger, query);
    },

    getClient: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getClient(app.ledger, params.id);
    },

    getClientByTaxId: async (request: FastifyRequest) => {
      const params = taxIdParamsSchema.parse(request.params);
      return getClientByTaxId(app.ledger, params.taxId);
    },

    clientStats: async () => clientStats(app.ledger),

    createClient: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = clientCreateSchema.parse(request.body);
      return reply.status(201).send(await createClient(app.ledger, payload));
    },

    updateClient: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = clientUpdateSchema.parse(request.body);
      return updateClient(app.ledger, params.id, payload);
    },

    deleteClient: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return deleteClient(app.ledger, params.id);
    },
  };
}
