import { describe, it, expect } from "vitest";
import { MemoryLedgerStore } from "../memory-store.js";
import { silentLogger } from "../../../__tests__/helpers.js";
import { ConcurrencyConflict, DuplicateKeyError } from "../../../utils/errors.js";
import { writeTotals } from "../../capabilities.js";

function createStore(lockTimeoutMs = 500) {
  return new MemoryLedgerStore({ lockTimeoutMs, log: silentLogger });
}

function gate() {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe("MemoryLedgerStore", () => {
  it("commits a unit of work and exposes it to readers", async () => {
    const store = createStore();
    const account = await store.write((uow) =>
      uow.accounts.insert({ code: "1000", name: "Cash", classification: "asset" }),
    );

    const found = await store.read((readers) => readers.accounts.findById(account.id));
    expect(found?.code).toBe("1000");
    expect(found?.revision).toBe(0);
  });

  it("discards every staged write when the unit throws", async () => {
    const store = createStore();

    await expect(
      store.write(async (uow) => {
        await uow.accounts.insert({ code: "1000", name: "Cash", classification: "asset" });
        await uow.accounts.insert({ code: "2000", name: "Payables", classification: "liability" });
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(store.size().accounts).toBe(0);
  });

  it("hides uncommitted writes from concurrent readers", async () => {
    const store = createStore();
    const { opened, open } = gate();

    const writing = store.write(async (uow) => {
      await uow.accounts.insert({ code: "1000", name: "Cash", classification: "asset" });
      await opened;
    });

    expect(await store.read((readers) => readers.accounts.findByCode("1000"))).toBeNull();
    open();
    await writing;
    expect(await store.read((readers) => readers.accounts.findByCode("1000"))).not.toBeNull();
  });

  it("rejects a duplicate unique value within one unit", async () => {
    const store = createStore();
    await expect(
      store.write(async (uow) => {
        await uow.products.insert({
          code: "SKU-1",
          name: "Widget",
          description: null,
          productType: "product",
          category: null,
          unitPrice: "1.00",
          unitOfMeasure: "unit",
          taxable: true,
          currentStock: "0.00",
          minimumStock: "0.00",
          isActive: true,
        });
        await uow.products.insert({
          code: "SKU-1",
          name: "Gadget",
          description: null,
          productType: "product",
          category: null,
          unitPrice: "2.00",
          unitOfMeasure: "unit",
          taxable: true,
          currentStock: "0.00",
          minimumStock: "0.00",
          isActive: true,
        });
      }),
    ).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it("re-checks unique values at commit against rows committed meanwhile", async () => {
    const store = createStore();
    const { opened, open } = gate();

    const slow = store.write(async (uow) => {
      await uow.accounts.insert({ code: "1000", name: "Cash", classification: "asset" });
      await opened;
    });
    await store.write((uow) => uow.accounts.insert({ code: "1000", name: "Bank", classification: "asset" }));
    open();

    await expect(slow).rejects.toBeInstanceOf(DuplicateKeyError);
    const accounts = await store.read((readers) => readers.accounts.list());
    expect(accounts.map((account) => account.name)).toEqual(["Bank"]);
  });

  it("allows any number of null values in a unique field", async () => {
    const store = createStore();
    await store.write(async (uow) => {
      for (const name of ["A", "B"]) {
        await uow.clients.insert({
          name,
          taxId: null,
          address: null,
          phone: null,
          email: null,
          clientType: "individual",
          notes: null,
          isActive: true,
        });
      }
    });
    expect(store.size().clients).toBe(2);
  });

  it("times out a second writer waiting on a held row lock", async () => {
    const store = createStore(20);
    const account = await store.write((uow) =>
      uow.accounts.insert({ code: "1000", name: "Cash", classification: "asset" }),
    );
    const { opened, open } = gate();

    const holder = store.write(async (uow) => {
      await uow.accounts.lockForUpdate(account.id);
      await opened;
    });

    await expect(store.write((uow) => uow.accounts.lockForUpdate(account.id))).rejects.toBeInstanceOf(
      ConcurrencyConflict,
    );
    open();
    await holder;

    const stored = await store.read((readers) => readers.accounts.findById(account.id));
    expect(stored?.revision).toBe(1);
  });

  it("refuses a totals write against a stale revision", async () => {
    const store = createStore();
    const invoice = await store.write((uow) =>
      uow.invoices.insert({
        invoiceNumber: "INV-2024-0001",
        clientId: null,
        transactionId: null,
        discount: "0.00",
        paymentTerms: "cash",
        salesperson: null,
        issuedAt: new Date("2024-01-01T00:00:00.000Z"),
        dueAt: null,
        notes: null,
      }),
    );

    await expect(
      store.write(async (uow) => {
        const locked = await uow.invoices.lockForUpdate(invoice.id);
        if (!locked) throw new Error("missing invoice");
        return uow.invoices[writeTotals](
          invoice.id,
          { subtotal: "1.00", tax: "0.00", grandTotal: "1.00" },
          locked.revision - 1,
        );
      }),
    ).rejects.toBeInstanceOf(ConcurrencyConflict);

    const stored = await store.read((readers) => readers.invoices.findById(invoice.id));
    expect(stored?.grandTotal).toBe("0.00");
  });
});
