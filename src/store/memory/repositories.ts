import { randomUUID } from "node:crypto";
import { writeTotals } from "../capabilities.js";
import { ConcurrencyConflict } from "../../utils/errors.js";
import type {
  AccountRecord,
  AccountRepository,
  CatalogFilter,
  ClientRecord,
  ClientRepository,
  DateRange,
  InvoiceFilter,
  InvoiceHeader,
  InvoiceLineRecord,
  InvoiceLineRepository,
  InvoiceRecord,
  InvoiceRepository,
  InvoiceTotals,
  LedgerEntryFilter,
  LedgerEntryRecord,
  LedgerEntryRepository,
  NewAccount,
  NewClient,
  NewInvoiceLine,
  NewLedgerEntry,
  NewPeriod,
  NewProduct,
  NewTransaction,
  Page,
  PageResult,
  PeriodRecord,
  PeriodRepository,
  ProductRecord,
  ProductRepository,
  TransactionFilter,
  TransactionRecord,
  TransactionRepository,
  UnitOfWork,
} from "../types.js";
import type { TableView } from "./table.js";
import type { MemoryUnit } from "./memory-unit.js";

interface Stored {
  id: string;
  createdAt: Date;
  updatedAt: Date;
}

function applyPatch<T extends object>(row: T, patch: Partial<T>): T {
  const next: T = { ...row, ...patch };
  // Undefined in a patch means "leave as is", not "clear".
  for (const key in patch) {
    if (patch[key] === undefined) next[key] = row[key];
  }
  return next;
}

function paginate<T>(rows: T[], page?: Page): PageResult<T> {
  if (!page) return { rows, total: rows.length };
  return { rows: rows.slice(page.skip, page.skip + page.limit), total: rows.length };
}

function withinRange(value: Date, range: DateRange): boolean {
  if (range.from && value < range.from) return false;
  if (range.to && value > range.to) return false;
  return true;
}

function matchesCatalog(row: { name: string; isActive: boolean }, filter: CatalogFilter = {}): boolean {
  if (filter.activeOnly && !row.isActive) return false;
  if (filter.search && !row.name.toLowerCase().includes(filter.search.toLowerCase())) return false;
  return true;
}

const byCreatedAt = (a: Stored, b: Stored) => a.createdAt.getTime() - b.createdAt.getTime();

abstract class MemoryRepository<T extends Stored, TNew> {
  constructor(
    protected readonly unit: MemoryUnit,
    protected readonly view: TableView<T>,
  ) {}

  protected abstract build(input: TNew, id: string, now: Date): T;

  async findById(id: string): Promise<T | null> {
    return this.view.get(id);
  }

  async insert(input: TNew): Promise<T> {
    const row = this.build(input, randomUUID(), new Date());
    this.view.put(row);
    return row;
  }

  async update(id: string, patch: Partial<T>): Promise<T | null> {
    const current = this.view.get(id);
    if (!current) return null;
    const next: T = { ...applyPatch(current, patch), updatedAt: new Date() };
    this.view.put(next);
    return next;
  }

  async delete(id: string): Promise<boolean> {
    if (!this.view.get(id)) return false;
    this.view.remove(id);
    return true;
  }

  protected deleteWhere(predicate: (row: T) => boolean): number {
    const rows = this.view.filter(predicate);
    for (const row of rows) this.view.remove(row.id);
    return rows.length;
  }
}

abstract class VersionedMemoryRepository<T extends Stored & { revision: number }, TNew> extends MemoryRepository<
  T,
  TNew
> {
  async lockForUpdate(id: string): Promise<T | null> {
    await this.unit.lock(`${this.view.entity}:${id}`);
    const current = this.view.get(id);
    if (!current) return null;
    const next = { ...current, revision: current.revision + 1 };
    this.view.put(next);
    return next;
  }
}

class MemoryAccountRepository extends VersionedMemoryRepository<AccountRecord, NewAccount> implements AccountRepository {
  protected build(input: NewAccount, id: string, now: Date): AccountRecord {
    return { ...input, id, revision: 0, createdAt: now, updatedAt: now };
  }

  async findByCode(code: string) {
    return this.view.filter((row) => row.code === code)[0] ?? null;
  }

  async list(filter: { classification?: AccountRecord["classification"] } = {}) {
    return this.view
      .filter((row) => !filter.classification || row.classification === filter.classification)
      .sort((a, b) => a.code.localeCompare(b.code));
  }
}

class MemoryPeriodRepository extends VersionedMemoryRepository<PeriodRecord, NewPeriod> implements PeriodRepository {
  protected build(input: NewPeriod, id: string, now: Date): PeriodRecord {
    return { ...input, id, revision: 0, createdAt: now, updatedAt: now };
  }

  async list(filter: { state?: PeriodRecord["state"] } = {}) {
    return this.view
      .filter((row) => !filter.state || row.state === filter.state)
      .sort((a, b) => b.startDate.getTime() - a.startDate.getTime());
  }
}

class MemoryTransactionRepository
  extends VersionedMemoryRepository<TransactionRecord, NewTransaction>
  implements TransactionRepository
{
  protected build(input: NewTransaction, id: string, now: Date): TransactionRecord {
    return { ...input, id, revision: 0, createdAt: now, updatedAt: now };
  }

  async list(filter: TransactionFilter, page?: Page) {
    const rows = this.view
      .filter(
        (row) =>
          (!filter.periodId || row.periodId === filter.periodId) &&
          (!filter.direction || row.direction === filter.direction) &&
          withinRange(row.occurredAt, filter),
      )
      .sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime());
    return paginate(rows, page);
  }

  async countByPeriod(periodId: string) {
    return this.view.filter((row) => row.periodId === periodId).length;
  }
}

class MemoryLedgerEntryRepository
  extends MemoryRepository<LedgerEntryRecord, NewLedgerEntry>
  implements LedgerEntryRepository
{
  protected build(input: NewLedgerEntry, id: string, now: Date): LedgerEntryRecord {
    return { ...input, id, createdAt: now, updatedAt: now };
  }

  async list(filter: LedgerEntryFilter, page?: Page) {
    const rows = this.view
      .filter(
        (row) =>
          (!filter.transactionId || row.transactionId === filter.transactionId) &&
          (!filter.accountId || row.accountId === filter.accountId),
      )
      .sort(byCreatedAt);
    return paginate(rows, page);
  }

  async listByTransactions(transactionIds: string[]) {
    const wanted = new Set(transactionIds);
    return this.view.filter((row) => wanted.has(row.transactionId)).sort(byCreatedAt);
  }

  async countByAccount(accountId: string) {
    return this.view.filter((row) => row.accountId === accountId).length;
  }

  async countByTransaction(transactionId: string) {
    return this.view.filter((row) => row.transactionId === transactionId).length;
  }

  async deleteByTransaction(transactionId: string) {
    return this.deleteWhere((row) => row.transactionId === transactionId);
  }
}

class MemoryClientRepository extends VersionedMemoryRepository<ClientRecord, NewClient> implements ClientRepository {
  protected build(input: NewClient, id: string, now: Date): ClientRecord {
    return { ...input, id, revision: 0, createdAt: now, updatedAt: now };
  }

  async findByTaxId(taxId: string) {
    return this.view.filter((row) => row.taxId === taxId)[0] ?? null;
  }

  async list(filter?: CatalogFilter) {
    return this.view.filter((row) => matchesCatalog(row, filter)).sort((a, b) => a.name.localeCompare(b.name));
  }
}

class MemoryProductRepository extends VersionedMemoryRepository<ProductRecord, NewProduct> implements ProductRepository {
  protected build(input: NewProduct, id: string, now: Date): ProductRecord {
    return { ...input, id, revision: 0, createdAt: now, updatedAt: now };
  }

  async findByCode(code: string) {
    return this.view.filter((row) => row.code === code)[0] ?? null;
  }

  async list(filter?: CatalogFilter) {
    return this.view.filter((row) => matchesCatalog(row, filter)).sort((a, b) => a.name.localeCompare(b.name));
  }
}

class MemoryInvoiceRepository extends VersionedMemoryRepository<InvoiceRecord, InvoiceHeader> implements InvoiceRepository {
  protected build(input: InvoiceHeader, id: string, now: Date): InvoiceRecord {
    return {
      ...input,
      id,
      subtotal: "0.00",
      tax: "0.00",
      grandTotal: "0.00",
      revision: 0,
      createdAt: now,
      updatedAt: now,
    };
  }

  async findByNumber(invoiceNumber: string) {
    return this.view.filter((row) => row.invoiceNumber === invoiceNumber)[0] ?? null;
  }

  async findMaxSequence(stem: string) {
    let max = 0;
    for (const row of this.view.filter((candidate) => candidate.invoiceNumber.startsWith(stem))) {
      const suffix = row.invoiceNumber.slice(stem.length);
      if (/^\d+$/.test(suffix)) max = Math.max(max, Number.parseInt(suffix, 10));
    }
    return max;
  }

  async list(filter: InvoiceFilter, page?: Page) {
    const rows = this.view
      .filter((row) => (!filter.clientId || row.clientId === filter.clientId) && withinRange(row.issuedAt, filter))
      .sort((a, b) => b.issuedAt.getTime() - a.issuedAt.getTime());
    return paginate(rows, page);
  }

  async countByClient(clientId: string) {
    return this.view.filter((row) => row.clientId === clientId).length;
  }

  async countByTransaction(transactionId: string) {
    return this.view.filter((row) => row.transactionId === transactionId).length;
  }

  async [writeTotals](id: string, totals: InvoiceTotals, expectedRevision: number) {
    const current = this.view.get(id);
    if (!current || current.revision !== expectedRevision) {
      throw new ConcurrencyConflict(`Invoice ${id} changed while its totals were being recomputed`, {
        expectedRevision,
        actualRevision: current?.revision ?? null,
      });
    }
    const next: InvoiceRecord = { ...current, ...totals, updatedAt: new Date() };
    this.view.put(next);
    return next;
  }
}

class MemoryInvoiceLineRepository
  extends MemoryRepository<InvoiceLineRecord, NewInvoiceLine>
  implements InvoiceLineRepository
{
  protected build(input: NewInvoiceLine, id: string, now: Date): InvoiceLineRecord {
    return { ...input, id, createdAt: now, updatedAt: now };
  }

  async listByInvoice(invoiceId: string) {
    return this.view.filter((row) => row.invoiceId === invoiceId).sort(byCreatedAt);
  }

  async countByProduct(productId: string) {
    return this.view.filter((row) => row.productId === productId).length;
  }

  async deleteByInvoice(invoiceId: string) {
    return this.deleteWhere((row) => row.invoiceId === invoiceId);
  }
}

export function createMemoryRepositories(unit: MemoryUnit): UnitOfWork {
  return {
    accounts: new MemoryAccountRepository(unit, unit.views.accounts),
    periods: new MemoryPeriodRepository(unit, unit.views.periods),
    transactions: new MemoryTransactionRepository(unit, unit.views.transactions),
    entries: new MemoryLedgerEntryRepository(unit, unit.views.entries),
    clients: new MemoryClientRepository(unit, unit.views.clients),
    products: new MemoryProductRepository(unit, unit.views.products),
    invoices: new MemoryInvoiceRepository(unit, unit.views.invoices),
    invoiceLines: new MemoryInvoiceLineRepository(unit, unit.views.invoiceLines),
  };
}
