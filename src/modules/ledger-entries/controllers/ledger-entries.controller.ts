import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  ledgerEntryCreateSchema,
  ledgerEntryUpdateSchema,
  listLedgerEntriesQuerySchema,
} from "../schemas/ledger-entries.schemas.js";
import {
  createLedgerEntry,
  deleteLedgerEntry,
  getLedgerEntry,
  listLedgerEntries,
  updateLedgerEntry,
} from "../services/ledger-entries.service.js";

export function createLedgerEntryController(app: FastifyInstance) {
  return {
    listEntries: async (request: FastifyRequest) => {
      const query = listLedgerEntriesQuerySchema.parse(request.query);
      return listLedgerEntries(app.ledger, query);
    },

    getEntry: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getLedgerEntry(app.ledger, params.id);
    },

    createEntry: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = ledgerEntryCreateSchema.parse(request.body);
      return reply.status(201).send(await createLedgerEntry(app.ledger, payload));
    },

    updateEntry: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = ledgerEntryUpdateSchema.parse(request.body);
      return updateLedgerEntry(app.ledger, params.id, payload);
    },

    deleteEntry: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return deleteLedgerEntry(app.ledger, params.id);
    },
  };
}
