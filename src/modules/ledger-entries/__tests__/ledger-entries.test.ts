import { describe, it, expect } from "vitest";
import { createTestContext, seedAccount, seedTransaction } from "../../../__tests__/helpers.js";
import { ledgerEntryCreateSchema, ledgerEntryUpdateSchema } from "../schemas/ledger-entries.schemas.js";
import {
  assertEntryAmounts,
  createLedgerEntry,
  deleteLedgerEntry,
  getLedgerEntry,
  updateLedgerEntry,
} from "../services/ledger-entries.service.js";
import { deleteAccount } from "../../accounts/services/accounts.service.js";
import { ConstraintViolation, NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";

describe("assertEntryAmounts()", () => {
  it("accepts exactly one positive side", () => {
    expect(assertEntryAmounts("100", "0")).toEqual({ debit: "100.00", credit: "0.00" });
    expect(assertEntryAmounts("0", "0.01")).toEqual({ debit: "0.00", credit: "0.01" });
  });

  it("rejects both sides zero", () => {
    expect(() => assertEntryAmounts("0", "0.00")).toThrow(ConstraintViolation);
  });

  it("rejects both sides positive", () => {
    expect(() => assertEntryAmounts("10", "10")).toThrow(ConstraintViolation);
  });

  it("rejects negative amounts", () => {
    expect(() => assertEntryAmounts("-5", "0")).toThrow(ConstraintViolation);
    expect(() => assertEntryAmounts("5", "-5")).toThrow(ConstraintViolation);
  });
});

describe("ledger entry service", () => {
  async function setup() {
    const { ctx, store } = createTestContext();
    const cash = await seedAccount(ctx, "1000", "Cash");
    const sales = await seedAccount(ctx, "4000", "Sales");
    const transaction = await seedTransaction(ctx);
    return { ctx, store, cash, sales, transaction };
  }

  it("posts a debit entry with a zero credit", async () => {
    const { ctx, cash, transaction } = await setup();
    const entry = await createLedgerEntry(
      ctx,
      ledgerEntryCreateSchema.parse({ transactionId: transaction.id, accountId: cash.id, debit: 50 }),
    );
    expect(entry.debit).toBe("50.00");
    expect(entry.credit).toBe("0.00");
    expect(await getLedgerEntry(ctx, entry.id)).toEqual(entry);
  });

  it("persists nothing for an invalid entry", async () => {
    const { ctx, store, cash, transaction } = await setup();
    await expect(
      createLedgerEntry(
        ctx,
        ledgerEntryCreateSchema.parse({ transactionId: transaction.id, accountId: cash.id, debit: 5, credit: 5 }),
      ),
    ).rejects.toBeInstanceOf(ConstraintViolation);
    expect(store.size().entries).toBe(0);
  });

  it("requires an existing transaction and account", async () => {
    const { ctx, cash, transaction } = await setup();
    await expect(
      createLedgerEntry(ctx, ledgerEntryCreateSchema.parse({ transactionId: "nope", accountId: cash.id, debit: 1 })),
    ).rejects.toBeInstanceOf(NotFoundError);
    await expect(
      createLedgerEntry(
        ctx,
        ledgerEntryCreateSchema.parse({ transactionId: transaction.id, accountId: "nope", debit: 1 }),
      ),
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("validates the merged entry on update", async () => {
    const { ctx, cash, sales, transaction } = await setup();
    const entry = await createLedgerEntry(
      ctx,
      ledgerEntryCreateSchema.parse({ transactionId: transaction.id, accountId: cash.id, debit: "50" }),
    );

    await expect(
      updateLedgerEntry(ctx, entry.id, ledgerEntryUpdateSchema.parse({ credit: "50" })),
    ).rejects.toBeInstanceOf(ConstraintViolation);

    const flipped = await updateLedgerEntry(
      ctx,
      entry.id,
      ledgerEntryUpdateSchema.parse({ accountId: sales.id, debit: "0", credit: "50" }),
    );
    expect(flipped).toMatchObject({ accountId: sales.id, debit: "0.00", credit: "50.00" });
  });

  it("deletes an entry", async () => {
    const { ctx, cash, transaction } = await setup();
    const entry = await createLedgerEntry(
      ctx,
      ledgerEntryCreateSchema.parse({ transactionId: transaction.id, accountId: cash.id, credit: "1" }),
    );
    expect(await deleteLedgerEntry(ctx, entry.id)).toEqual({ id: entry.id, deleted: true });
    await expect(getLedgerEntry(ctx, entry.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("blocks deleting an account that entries reference", async () => {
    const { ctx, cash, transaction } = await setup();
    await createLedgerEntry(
      ctx,
      ledgerEntryCreateSchema.parse({ transactionId: transaction.id, accountId: cash.id, debit: "1" }),
    );
    await expect(deleteAccount(ctx, cash.id)).rejects.toBeInstanceOf(ReferentialIntegrityError);
  });
});
