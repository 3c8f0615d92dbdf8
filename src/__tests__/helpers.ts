// Shared fixtures for service-level tests against the in-memory store
import { MemoryLedgerStore } from "../store/memory/memory-store.js";
import type { LedgerContext, LedgerSettings, LoggerLike } from "../types.js";
import { createAccount } from "../modules/accounts/services/accounts.service.js";
import { accountCreateSchema } from "../modules/accounts/schemas/accounts.schemas.js";
import { createClient } from "../modules/clients/services/clients.service.js";
import { clientCreateSchema } from "../modules/clients/schemas/clients.schemas.js";
import { createProduct } from "../modules/products/services/products.service.js";
import { productCreateSchema } from "../modules/products/schemas/products.schemas.js";
import { createTransaction } from "../modules/transactions/services/transactions.service.js";
import { transactionCreateSchema } from "../modules/transactions/schemas/transactions.schemas.js";

const noop = () => undefined;

export const silentLogger: LoggerLike = { debug: noop, info: noop, warn: noop, error: noop };

export const testSettings: LedgerSettings = {
  taxRate: "0.13",
  invoiceNumberPrefix: "INV",
  allowTransactionCascadeDelete: false,
};

export function createTestContext(overrides: Partial<LedgerSettings> = {}, lockTimeoutMs = 1000) {
  const store = new MemoryLedgerStore({ lockTimeoutMs, log: silentLogger });
  const ctx: LedgerContext = { store, settings: { ...testSettings, ...overrides }, log: silentLogger };
  return { ctx, store };
}

export function seedAccount(ctx: LedgerContext, code: string, name = `Account ${code}`) {
  return createAccount(ctx, accountCreateSchema.parse({ code, name, classification: "asset" }));
}

export function seedTransaction(ctx: LedgerContext, input: { occurredAt?: string; periodId?: string } = {}) {
  return createTransaction(
    ctx,
    transactionCreateSchema.parse({ description: "Test posting", direction: "income", createdBy: "tester", ...input }),
  );
}

export function seedProduct(
  ctx: LedgerContext,
  input: {
    name?: string;
    code?: string;
    unitPrice?: string;
    taxable?: boolean;
    isActive?: boolean;
    productType?: "product" | "service";
    currentStock?: string;
    minimumStock?: string;
  } = {},
) {
  return createProduct(ctx, productCreateSchema.parse({ name: "Widget", unitPrice: "15.00", ...input }));
}

export function seedClient(ctx: LedgerContext, input: { name?: string; isActive?: boolean } = {}) {
  return createClient(ctx, clientCreateSchema.parse({ name: "Acme Ltd", clientType: "company", ...input }));
}
