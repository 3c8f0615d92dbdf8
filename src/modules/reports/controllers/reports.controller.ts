import type { FastifyInstance, FastifyRequest } from "fastify";
import {
  generalLedgerQuerySchema,
  invoiceStatsQuerySchema,
  journalQuerySchema,
  periodBalanceQuerySchema,
  topClientsQuerySchema,
} from "../schemas/reports.schemas.js";
import { generalLedger, invoiceStats, journal, periodBalance, topClients } from "../services/reports.service.js";

export function createReportController(app: FastifyInstance) {
  return {
    generalLedger: async (request: FastifyRequest) => {
      const query = generalLedgerQuerySchema.parse(request.query);
      return generalLedger(app.ledger, query);
    },

    journal: async (request: FastifyRequest) => {
      const query = journalQuerySchema.parse(request.query);
      return journal(app.ledger, query);
    },

    invoiceStats: async (request: FastifyRequest) => {
      const query = invoiceStatsQuerySchema.parse(request.query);
      return invoiceStats(app.ledger, query);
    },

    topClients: async (request: FastifyRequest) => {
      const query = topClientsQuerySchema.parse(request.query);
      return topClients(app.ledger, query);
    },

    periodBalance: async (request: FastifyRequest) => {
      const query = periodBalanceQuerySchema.parse(request.query);
      return periodBalance(app.ledger, query);
    },
  };
}
