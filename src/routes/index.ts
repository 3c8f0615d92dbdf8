import type { FastifyInstance } from "fastify";
import { accountRoutes } from "../modules/accounts/index.js";
import { clientRoutes } from "../modules/clients/index.js";
import { invoiceRoutes } from "../modules/invoices/index.js";
import { ledgerEntryRoutes } from "../modules/ledger-entries/index.js";
import { periodRoutes } from "../modules/periods/index.js";
import { productRoutes } from "../modules/products/index.js";
import { reportRoutes } from "../modules/reports/index.js";
import { transactionRoutes } from "../modules/transactions/index.js";

const ROUTE_REGISTRARS = [
  accountRoutes,
  periodRoutes,
  clientRoutes,
  productRoutes,
  transactionRoutes,
  ledgerEntryRoutes,
  invoiceRoutes,
  reportRoutes,
] as const;

export async function registerApiRoutes(app: FastifyInstance) {
  for (const register of ROUTE_REGISTRARS) {
    await app.register(register);
  }
}
