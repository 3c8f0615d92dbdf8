import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  listPeriodsQuerySchema,
  periodCreateSchema,
  periodUpdateSchema,
} from "../schemas/periods.schemas.js";
import {
  createPeriod,
  deletePeriod,
  getPeriod,
  listPeriods,
  updatePeriod,
} from "../services/periods.service.js";

export function createPeriodController(app: FastifyInstance) {
  return {
    listPeriods: async (request: FastifyRequest) => {
      const query = listPeriodsQuerySchema.parse(request.query);
      return listPeriods(app.ledger, query);
    },

    getPeriod: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getPeriod(app.ledger, params.id);
    },

    createPeriod: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = periodCreateSchema.parse(request.body);
      return reply.status(201).send(await createPeriod(app.ledger, payload));
    },

    updatePeriod: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = periodUpdateSchema.parse(request.body);
      return updatePeriod(app.ledger, params.id, payload);
    },

    deletePeriod: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return deletePeriod(app.ledger, params.id);
    },
  };
}
