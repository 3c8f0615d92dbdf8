import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from "vitest";
import mongoose from "mongoose";
import { AccountModel, ClientModel, InvoiceModel, PeriodModel, ProductModel, TransactionModel } from "../../../db/models.js";
import { createMongoRepositories } from "../repositories.js";

// No connection is opened: with buffering off every query fails fast, after
// the model method has been called with its options.
describe("Mongo repositories", () => {
  beforeAll(() => {
    mongoose.set("bufferCommands", false);
  });

  afterAll(() => {
    mongoose.set("bufferCommands", true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("locks rows without touching their timestamps", async () => {
    const repositories = createMongoRepositories(null);
    const cases = [
      { track: () => vi.spyOn(AccountModel, "findByIdAndUpdate"), lock: () => repositories.accounts.lockForUpdate("row-1") },
      { track: () => vi.spyOn(PeriodModel, "findByIdAndUpdate"), lock: () => repositories.periods.lockForUpdate("row-1") },
      {
        track: () => vi.spyOn(TransactionModel, "findByIdAndUpdate"),
        lock: () => repositories.transactions.lockForUpdate("row-1"),
      },
      { track: () => vi.spyOn(ClientModel, "findByIdAndUpdate"), lock: () => repositories.clients.lockForUpdate("row-1") },
      { track: () => vi.spyOn(ProductModel, "findByIdAndUpdate"), lock: () => repositories.products.lockForUpdate("row-1") },
      { track: () => vi.spyOn(InvoiceModel, "findByIdAndUpdate"), lock: () => repositories.invoices.lockForUpdate("row-1") },
    ];

    for (const { track, lock } of cases) {
      const spy = track();
      await expect(lock()).rejects.toThrow();
      expect(spy).toHaveBeenCalledWith(
        "row-1",
        { $inc: { revision: 1 } },
        expect.objectContaining({ new: true, timestamps: false }),
      );
    }
  });
});
