import type { LedgerContext } from "../../../types.js";
import type { InvoiceReader, InvoiceRecord, Readers, UnitOfWork } from "../../../store/types.js";
import { paymentTermDays, type PaymentTerms } from "../../../utils/constants.js";
import {
  ConstraintViolation,
  DuplicateKeyError,
  NotFoundError,
} from "../../../utils/errors.js";
import { compareAmounts, normalizeAmount, ZERO_AMOUNT } from "../../../utils/money.js";
import { paginatedResult, toPage } from "../../../utils/pagination.js";
import type {
  InvoiceCreatePayload,
  InvoiceUpdatePayload,
  ListInvoicesQuery,
} from "../schemas/invoices.schemas.js";
import { insertLine } from "./invoice-lines.service.js";
import { recomputeInvoiceTotals } from "./invoice-totals.service.js";

const MAX_NUMBER_ATTEMPTS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

export function formatInvoiceNumber(prefix: string, year: number, sequence: number): string {
  return `${prefix}-${year}-${String(sequence).padStart(4, "0")}`;
}

/**
 * Next `<PREFIX>-<YYYY>-<NNNN>` after the highest sequence issued for that
 * year. Manually supplied numbers outside that pattern are ignored.
 */
export async function nextInvoiceNumber(invoices: InvoiceReader, prefix: string, issuedAt: Date): Promise<string> {
  const year = issuedAt.getUTCFullYear();
  const last = await invoices.findMaxSequence(`${prefix}-${year}-`);
  return formatInvoiceNumber(prefix, year, last + 1);
}

export function deriveDueAt(terms: PaymentTerms, issuedAt: Date): Date | null {
  const days = paymentTermDays[terms];
  return days === null ? null : new Date(issuedAt.getTime() + days * DAY_MS);
}

function normalizeDiscount(value: string): string {
  const discount = normalizeAmount(value);
  if (compareAmounts(discount, ZERO_AMOUNT) < 0) {
    throw new ConstraintViolation("Invoice discount must not be negative", { discount: value });
  }
  return discount;
}

async function lockReferences(uow: UnitOfWork, refs: { clientId?: string | null; transactionId?: string | null }) {
  if (refs.clientId) {
    const client = await uow.clients.lockForUpdate(refs.clientId);
    if (!client) throw new NotFoundError("Client", refs.clientId);
    if (!client.isActive) {
      throw new ConstraintViolation(`Client ${client.name} is inactive`, { clientId: client.id });
    }
  }
  if (refs.transactionId) {
    const transaction = await uow.transactions.lockForUpdate(refs.transactionId);
    if (!transaction) throw new NotFoundError("Transaction", refs.transactionId);
  }
}

async function withLines(readers: Readers, invoice: InvoiceRecord) {
  const lines = await readers.invoiceLines.listByInvoice(invoice.id);
  return { ...invoice, lines };
}

function isInvoiceNumberClash(error: unknown): boolean {
  return error instanceof DuplicateKeyError && error.field === "invoiceNumber";
}

/**
 * Create the header and any inline lines in one unit of work: either the
 * invoice exists with all its lines and matching totals, or nothing does.
 * A generated number that collides with a concurrent create is regenerated.
 */
export async function createInvoice(ctx: LedgerContext, payload: InvoiceCreatePayload) {
  const discount = normalizeDiscount(payload.discount);
  const issuedAt = payload.issuedAt ?? new Date();
  const dueAt = payload.dueAt === undefined ? deriveDueAt(payload.paymentTerms, issuedAt) : payload.dueAt;

  for (let attempt = 1; ; attempt++) {
    try {
      return await ctx.store.write(async (uow) => {
        await lockReferences(uow, payload);

        const invoiceNumber =
          payload.invoiceNumber ??
          (await nextInvoiceNumber(uow.invoices, ctx.settings.invoiceNumberPrefix, issuedAt));

        const header = await uow.invoices.insert({
          invoiceNumber,
          clientId: payload.clientId ?? null,
          transactionId: payload.transactionId ?? null,
          discount,
          paymentTerms: payload.paymentTerms,
          salesperson: payload.salesperson ?? null,
          issuedAt,
          dueAt,
          notes: payload.notes ?? null,
        });

        await uow.invoices.lockForUpdate(header.id);
        for (const line of payload.lines) {
          await insertLine(uow, ctx.settings, header.id, line);
        }
        const invoice = await recomputeInvoiceTotals(uow, header.id);
        return withLines(uow, invoice);
      });
    } catch (error) {
      if (payload.invoiceNumber || attempt >= MAX_NUMBER_ATTEMPTS || !isInvoiceNumberClash(error)) throw error;
      ctx.log.warn(`[invoices] generated invoice number collided, retrying (attempt ${attempt + 1})`);
    }
  }
}

export async function getInvoice(ctx: LedgerContext, id: string) {
  return ctx.store.read(async (readers) => {
    const invoice = await readers.invoices.findById(id);
    if (!invoice) throw new NotFoundError("Invoice", id);
    return withLines(readers, invoice);
  });
}

export async function getInvoiceByNumber(ctx: LedgerContext, invoiceNumber: string) {
  return ctx.store.read(async (readers) => {
    const invoice = await readers.invoices.findByNumber(invoiceNumber);
    if (!invoice) throw new NotFoundError("Invoice", invoiceNumber);
    return withLines(readers, invoice);
  });
}

export async function listInvoices(ctx: LedgerContext, query: ListInvoicesQuery) {
  if (query.from && query.to && query.from > query.to) {
    throw new ConstraintViolation("'from' must not be after 'to'");
  }
  const result = await ctx.store.read((readers) =>
    readers.invoices.list({ clientId: query.clientId, from: query.from, to: query.to }, toPage(query)),
  );
  return paginatedResult(result, query);
}

/**
 * Header fields only. Changing terms or issue date without an explicit
 * `dueAt` re-derives the due date.
 */
export async function updateInvoice(ctx: LedgerContext, id: string, payload: InvoiceUpdatePayload) {
  return ctx.store.write(async (uow) => {
    const current = await uow.invoices.lockForUpdate(id);
    if (!current) throw new NotFoundError("Invoice", id);

    await lockReferences(uow, {
      clientId: payload.clientId !== current.clientId ? payload.clientId : undefined,
      transactionId: payload.transactionId,
    });

    let dueAt = payload.dueAt;
    if (dueAt === undefined && (payload.paymentTerms || payload.issuedAt)) {
      dueAt = deriveDueAt(payload.paymentTerms ?? current.paymentTerms, payload.issuedAt ?? current.issuedAt);
    }

    const updated = await uow.invoices.update(id, {
      ...payload,
      discount: payload.discount === undefined ? undefined : normalizeDiscount(payload.discount),
      dueAt,
    });
    if (!updated) throw new NotFoundError("Invoice", id);
    return withLines(uow, updated);
  });
}

/** Lines go with their invoice. */
export async function deleteInvoice(ctx: LedgerContext, id: string) {
  const linesDeleted = await ctx.store.write(async (uow) => {
    const current = await uow.invoices.lockForUpdate(id);
    if (!current) throw new NotFoundError("Invoice", id);
    const removed = await uow.invoiceLines.deleteByInvoice(id);
    await uow.invoices.delete(id);
    return removed;
  });
  ctx.log.info(`[invoices] deleted ${id} with ${linesDeleted} line(s)`);
  return { id, deleted: true, linesDeleted };
}
