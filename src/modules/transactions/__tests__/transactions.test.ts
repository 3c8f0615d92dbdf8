import { describe, it, expect } from "vitest";
import { createTestContext, seedAccount, seedTransaction } from "../../../__tests__/helpers.js";
import { ledgerEntryCreateSchema } from "../../ledger-entries/schemas/ledger-entries.schemas.js";
import { createLedgerEntry } from "../../ledger-entries/services/ledger-entries.service.js";
import {
  deleteTransactionQuerySchema,
  listTransactionsQuerySchema,
  transactionCreateSchema,
} from "../schemas/transactions.schemas.js";
import {
  createTransaction,
  deleteTransaction,
  getTransaction,
  getTransactionBalance,
  listTransactions,
} from "../services/transactions.service.js";
import type { LedgerContext } from "../../../types.js";
import { ConstraintViolation, NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";

async function post(ctx: LedgerContext, transactionId: string, accountId: string, side: "debit" | "credit", amount: string) {
  return createLedgerEntry(ctx, ledgerEntryCreateSchema.parse({ transactionId, accountId, [side]: amount }));
}

describe("transaction balance", () => {
  it("reports an unbalanced transaction without rejecting it", async () => {
    const { ctx } = createTestContext();
    const cash = await seedAccount(ctx, "1000", "Cash");
    const transaction = await seedTransaction(ctx);
    await post(ctx, transaction.id, cash.id, "debit", "100");

    expect(await getTransactionBalance(ctx, transaction.id)).toEqual({
      transactionId: transaction.id,
      totalDebit: "100.00",
      totalCredit: "0.00",
      isBalanced: false,
    });
  });

  it("is balanced once debits equal credits", async () => {
    const { ctx } = createTestContext();
    const cash = await seedAccount(ctx, "1000", "Cash");
    const sales = await seedAccount(ctx, "4000", "Sales");
    const transaction = await seedTransaction(ctx);
    await post(ctx, transaction.id, cash.id, "debit", "60.10");
    await post(ctx, transaction.id, cash.id, "debit", "39.90");
    await post(ctx, transaction.id, sales.id, "credit", "100");

    const balance = await getTransactionBalance(ctx, transaction.id);
    expect(balance.isBalanced).toBe(true);
    expect(balance.totalDebit).toBe("100.00");

    const detail = await getTransaction(ctx, transaction.id);
    expect(detail.entries).toHaveLength(3);
    expect(detail.balance).toEqual(balance);
  });

  it("treats a transaction without entries as balanced", async () => {
    const { ctx } = createTestContext();
    const transaction = await seedTransaction(ctx);
    expect((await getTransactionBalance(ctx, transaction.id)).isBalanced).toBe(true);
  });

  it("fails for an unknown transaction", async () => {
    const { ctx } = createTestContext();
    await expect(getTransactionBalance(ctx, "missing")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("transaction lifecycle", () => {
  it("defaults and uppercases the currency", async () => {
    const { ctx } = createTestContext();
    const usd = await seedTransaction(ctx);
    const eur = await createTransaction(
      ctx,
      transactionCreateSchema.parse({ description: "Fee", direction: "expense", createdBy: "tester", currency: "eur" }),
    );
    expect(usd.currency).toBe("USD");
    expect(eur.currency).toBe("EUR");
  });

  it("requires an existing period", async () => {
    const { ctx } = createTestContext();
    await expect(seedTransaction(ctx, { periodId: "missing" })).rejects.toBeInstanceOf(NotFoundError);
  });

  it("lists by date range, newest first", async () => {
    const { ctx } = createTestContext();
    await seedTransaction(ctx, { occurredAt: "2024-01-10T00:00:00.000Z" });
    const feb = await seedTransaction(ctx, { occurredAt: "2024-02-10T00:00:00.000Z" });
    const mar = await seedTransaction(ctx, { occurredAt: "2024-03-10T00:00:00.000Z" });

    const page = await listTransactions(
      ctx,
      listTransactionsQuerySchema.parse({ from: "2024-02-01T00:00:00.000Z", to: "2024-03-31T00:00:00.000Z" }),
    );
    expect(page.total).toBe(2);
    expect(page.data.map((row) => row.id)).toEqual([mar.id, feb.id]);

    await expect(
      listTransactions(ctx, listTransactionsQuerySchema.parse({ from: "2024-03-01", to: "2024-02-01" })),
    ).rejects.toBeInstanceOf(ConstraintViolation);
  });

  it("deletes a transaction without entries", async () => {
    const { ctx } = createTestContext();
    const transaction = await seedTransaction(ctx);
    expect(await deleteTransaction(ctx, transaction.id, deleteTransactionQuerySchema.parse({}))).toEqual({
      id: transaction.id,
      deleted: true,
      entriesDeleted: 0,
    });
  });

  it("restricts deleting a transaction that has entries", async () => {
    const { ctx, store } = createTestContext();
    const cash = await seedAccount(ctx, "1000", "Cash");
    const transaction = await seedTransaction(ctx);
    await post(ctx, transaction.id, cash.id, "debit", "10");

    await expect(deleteTransaction(ctx, transaction.id, { cascade: false })).rejects.toBeInstanceOf(
      ReferentialIntegrityError,
    );
    expect(store.size().entries).toBe(1);
    expect(store.size().transactions).toBe(1);
  });

  it("refuses cascade unless the deployment enables it", async () => {
    const { ctx } = createTestContext();
    const transaction = await seedTransaction(ctx);
    await expect(deleteTransaction(ctx, transaction.id, { cascade: true })).rejects.toBeInstanceOf(
      ConstraintViolation,
    );
  });

  it("cascades to entries when enabled and asked for", async () => {
    const { ctx, store } = createTestContext({ allowTransactionCascadeDelete: true });
    const cash = await seedAccount(ctx, "1000", "Cash");
    const transaction = await seedTransaction(ctx);
    await post(ctx, transaction.id, cash.id, "debit", "10");
    await post(ctx, transaction.id, cash.id, "credit", "10");

    const result = await deleteTransaction(
      ctx,
      transaction.id,
      deleteTransactionQuerySchema.parse({ cascade: "true" }),
    );

    expect(result).toEqual({ id: transaction.id, deleted: true, entriesDeleted: 2 });
    expect(store.size().entries).toBe(0);
    expect(store.size().transactions).toBe(0);
  });
});
