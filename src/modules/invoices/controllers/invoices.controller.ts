import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { idParamsSchema } from "../../../utils/validation.js";
import {
  invoiceCreateSchema,
  invoiceLineCreateSchema,
  invoiceLineParamsSchema,
  invoiceLineUpdateSchema,
  invoiceNumberParamsSchema,
  invoiceUpdateSchema,
  listInvoicesQuerySchema,
} from "../schemas/invoices.schemas.js";
import {
  addInvoiceLine,
  listInvoiceLines,
  removeInvoiceLine,
  updateInvoiceLine,
} from "../services/invoice-lines.service.js";
import {
  createInvoice,
  deleteInvoice,
  getInvoice,
  getInvoiceByNumber,
  listInvoices,
  updateInvoice,
} from "../services/invoices.service.js";

export function createInvoiceController(app: FastifyInstance) {
  return {
    listInvoices: async (request: FastifyRequest) => {
      const query = listInvoicesQuerySchema.parse(request.query);
      return listInvoices(app.ledger, query);
    },

    getInvoice: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return getInvoice(app.ledger, params.id);
    },

    getInvoiceByNumber: async (request: FastifyRequest) => {
      const params = invoiceNumberParamsSchema.parse(request.params);
      return getInvoiceByNumber(app.ledger, params.invoiceNumber);
    },

    createInvoice: async (request: FastifyRequest, reply: FastifyReply) => {
      const payload = invoiceCreateSchema.parse(request.body);
      return reply.status(201).send(await createInvoice(app.ledger, payload));
    },

    updateInvoice: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      const payload = invoiceUpdateSchema.parse(request.body);
      return updateInvoice(app.ledger, params.id, payload);
    },

    deleteInvoice: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return deleteInvoice(app.ledger, params.id);
    },

    listLines: async (request: FastifyRequest) => {
      const params = idParamsSchema.parse(request.params);
      return listInvoiceLines(app.ledger, params.id);
    },

    addLine: async (request: FastifyRequest, reply: FastifyReply) => {
      const params = idParamsSchema.parse(request.params);
      const payload = invoiceLineCreateSchema.parse(request.body);
      return reply.status(201).send(await addInvoiceLine(app.ledger, params.id, payload));
    },

    updateLine: async (request: FastifyRequest) => {
      const params = invoiceLineParamsSchema.parse(request.params);
      const payload = invoiceLineUpdateSchema.parse(request.body);
      return updateInvoiceLine(app.ledger, params.id, params.lineId, payload);
    },

    removeLine: async (request: FastifyRequest) => {
      const params = invoiceLineParamsSchema.parse(request.params);
      return removeInvoiceLine(app.ledger, params.id, params.lineId);
    },
  };
}
