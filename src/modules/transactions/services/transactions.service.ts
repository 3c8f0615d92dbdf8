import type { LedgerContext } from "../../../types.js";
import type { Readers, UnitOfWork } from "../../../store/types.js";
import { ConstraintViolation, NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";
import { sumAmounts } from "../../../utils/money.js";
import { paginatedResult, toPage } from "../../../utils/pagination.js";
import type {
  DeleteTransactionQuery,
  ListTransactionsQuery,
  TransactionCreatePayload,
  TransactionUpdatePayload,
} from "../schemas/transactions.schemas.js";

export interface TransactionBalance {
  transactionId: string;
  totalDebit: string;
  totalCredit: string;
  isBalanced: boolean;
}

async function lockPeriod(uow: UnitOfWork, periodId: string) {
  const period = await uow.periods.lockForUpdate(periodId);
  if (!period) throw new NotFoundError("Period", periodId);
  return period;
}

export async function createTransaction(ctx: LedgerContext, payload: TransactionCreatePayload) {
  return ctx.store.write(async (uow) => {
    if (payload.periodId) await lockPeriod(uow, payload.periodId);
    return uow.transactions.insert({
      occurredAt: payload.occurredAt ?? new Date(),
      description: payload.description,
      direction: payload.direction,
      currency: payload.currency,
      createdBy: payload.createdBy,
      periodId: payload.periodId ?? null,
      category: payload.category ?? null,
    });
  });
}

export async function listTransactions(ctx: LedgerContext, query: ListTransactionsQuery) {
  if (query.from && query.to && query.from > query.to) {
    throw new ConstraintViolation("'from' must not be after 'to'");
  }
  const result = await ctx.store.read((readers) =>
    readers.transactions.list(
      { periodId: query.periodId, direction: query.direction, from: query.from, to: query.to },
      toPage(query),
    ),
  );
  return paginatedResult(result, query);
}

/** The transaction header with its entries and current balance. */
export async function getTransaction(ctx: LedgerContext, id: string) {
  return ctx.store.read(async (readers) => {
    const transaction = await readers.transactions.findById(id);
    if (!transaction) throw new NotFoundError("Transaction", id);
    const { rows: entries } = await readers.entries.list({ transactionId: id });
    return { ...transaction, entries, balance: summarize(id, entries) };
  });
}

export async function updateTransaction(ctx: LedgerContext, id: string, payload: TransactionUpdatePayload) {
  return ctx.store.write(async (uow) => {
    const current = await uow.transactions.lockForUpdate(id);
    if (!current) throw new NotFoundError("Transaction", id);
    if (payload.periodId) await lockPeriod(uow, payload.periodId);

    const updated = await uow.transactions.update(id, payload);
    if (!updated) throw new NotFoundError("Transaction", id);
    return updated;
  });
}

/**
 * Rejected while entries exist. `cascade` removes the entries in the same
 * unit of work and is only honoured when the deployment enables it.
 * Invoices that point at the transaction always block deletion.
 */
export async function deleteTransaction(ctx: LedgerContext, id: string, query: DeleteTransactionQuery) {
  if (query.cascade && !ctx.settings.allowTransactionCascadeDelete) {
    throw new ConstraintViolation("Cascading transaction deletes are disabled", { id });
  }

  const entriesDeleted = await ctx.store.write(async (uow) => {
    const current = await uow.transactions.lockForUpdate(id);
    if (!current) throw new NotFoundError("Transaction", id);

    const invoices = await uow.invoices.countByTransaction(id);
    if (invoices > 0) throw new ReferentialIntegrityError("Transaction", id, "Invoice", invoices);

    let removed = 0;
    if (query.cascade) {
      removed = await uow.entries.deleteByTransaction(id);
    } else {
      const entries = await uow.entries.countByTransaction(id);
      if (entries > 0) throw new ReferentialIntegrityError("Transaction", id, "LedgerEntry", entries);
    }

    await uow.transactions.delete(id);
    return removed;
  });

  if (entriesDeleted > 0) ctx.log.warn(`[transactions] deleted ${id} with ${entriesDeleted} entries`);
  return { id, deleted: true, entriesDeleted };
}

function summarize(transactionId: string, entries: Array<{ debit: string; credit: string }>): TransactionBalance {
  const totalDebit = sumAmounts(entries.map((entry) => entry.debit));
  const totalCredit = sumAmounts(entries.map((entry) => entry.credit));
  return { transactionId, totalDebit, totalCredit, isBalanced: totalDebit === totalCredit };
}

/**
 * Sum of debits and credits over every entry of the transaction. Advisory
 * only: never called on write, and an unbalanced transaction is valid state.
 */
export async function computeBalance(readers: Readers, transactionId: string): Promise<TransactionBalance> {
  const transaction = await readers.transactions.findById(transactionId);
  if (!transaction) throw new NotFoundError("Transaction", transactionId);
  const { rows } = await readers.entries.list({ transactionId });
  return summarize(transactionId, rows);
}

export async function getTransactionBalance(ctx: LedgerContext, transactionId: string) {
  return ctx.store.read((readers) => computeBalance(readers, transactionId));
}
