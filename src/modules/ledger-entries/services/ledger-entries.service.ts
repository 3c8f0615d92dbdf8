import type { LedgerContext } from "../../../types.js";
import type { LedgerEntryRecord, NewLedgerEntry, UnitOfWork } from "../../../store/types.js";
import { ConstraintViolation, NotFoundError } from "../../../utils/errors.js";
import { fromScaled, toScaled } from "../../../utils/money.js";
import { paginatedResult, toPage } from "../../../utils/pagination.js";
import type {
  LedgerEntryCreatePayload,
  LedgerEntryUpdatePayload,
  ListLedgerEntriesQuery,
} from "../schemas/ledger-entries.schemas.js";

/**
 * Exactly one side is strictly positive and the other is exactly zero.
 * Returns both sides in canonical two-place form.
 */
export function assertEntryAmounts(debit: string, credit: string): { debit: string; credit: string } {
  const d = toScaled(debit);
  const c = toScaled(credit);

  if (d < 0n || c < 0n) {
    throw new ConstraintViolation("Debit and credit must not be negative", { debit, credit });
  }
  if (d === 0n && c === 0n) {
    throw new ConstraintViolation("A ledger entry needs a debit or a credit amount", { debit, credit });
  }
  if (d > 0n && c > 0n) {
    throw new ConstraintViolation("A ledger entry cannot carry both a debit and a credit", { debit, credit });
  }

  return { debit: fromScaled(d), credit: fromScaled(c) };
}

/**
 * Persist one entry inside `uow`. The transaction and account are locked
 * first; no other entry is read or touched, so a transaction may be
 * unbalanced between writes.
 */
export async function validateAndPersist(
  uow: UnitOfWork,
  entry: NewLedgerEntry,
  existingId?: string,
): Promise<LedgerEntryRecord> {
  const amounts = assertEntryAmounts(entry.debit, entry.credit);

  const transaction = await uow.transactions.lockForUpdate(entry.transactionId);
  if (!transaction) throw new NotFoundError("Transaction", entry.transactionId);
  const account = await uow.accounts.lockForUpdate(entry.accountId);
  if (!account) throw new NotFoundError("Account", entry.accountId);

  const row = { transactionId: transaction.id, accountId: account.id, ...amounts };
  if (!existingId) return uow.entries.insert(row);

  const updated = await uow.entries.update(existingId, row);
  if (!updated) throw new NotFoundError("LedgerEntry", existingId);
  return updated;
}

export async function createLedgerEntry(ctx: LedgerContext, payload: LedgerEntryCreatePayload) {
  const entry = await ctx.store.write((uow) => validateAndPersist(uow, payload));
  ctx.log.debug(`[entries] posted ${entry.id} to transaction ${entry.transactionId}`);
  return entry;
}

export async function getLedgerEntry(ctx: LedgerContext, id: string) {
  const entry = await ctx.store.read((readers) => readers.entries.findById(id));
  if (!entry) throw new NotFoundError("LedgerEntry", id);
  return entry;
}

export async function listLedgerEntries(ctx: LedgerContext, query: ListLedgerEntriesQuery) {
  const result = await ctx.store.read((readers) =>
    readers.entries.list({ transactionId: query.transactionId, accountId: query.accountId }, toPage(query)),
  );
  return paginatedResult(result, query);
}

/** The patch is merged over the stored entry and the result validated as a whole. */
export async function updateLedgerEntry(ctx: LedgerContext, id: string, payload: LedgerEntryUpdatePayload) {
  return ctx.store.write(async (uow) => {
    const current = await uow.entries.findById(id);
    if (!current) throw new NotFoundError("LedgerEntry", id);

    return validateAndPersist(
      uow,
      {
        transactionId: current.transactionId,
        accountId: payload.accountId ?? current.accountId,
        debit: payload.debit ?? current.debit,
        credit: payload.credit ?? current.credit,
      },
      id,
    );
  });
}

export async function deleteLedgerEntry(ctx: LedgerContext, id: string) {
  await ctx.store.write(async (uow) => {
    const current = await uow.entries.findById(id);
    if (!current) throw new NotFoundError("LedgerEntry", id);
    await uow.transactions.lockForUpdate(current.transactionId);
    await uow.entries.delete(id);
  });
  return { id, deleted: true };
}
