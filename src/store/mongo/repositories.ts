import mongoose, { type ClientSession } from "mongoose";
import {
  AccountModel,
  ClientModel,
  InvoiceLineModel,
  InvoiceModel,
  LedgerEntryModel,
  PeriodModel,
  ProductModel,
  TransactionModel,
  type AccountDoc,
  type ClientDoc,
  type InvoiceDoc,
  type InvoiceLineDoc,
  type LedgerEntryDoc,
  type PeriodDoc,
  type ProductDoc,
  type TransactionDoc,
} from "../../db/models.js";
import { ConcurrencyConflict, DuplicateKeyError, type EntityName } from "../../utils/errors.js";
import { writeTotals } from "../capabilities.js";
import type {
  AccountPatch,
  AccountRecord,
  AccountRepository,
  CatalogFilter,
  ClientPatch,
  ClientRepository,
  DateRange,
  InvoiceFilter,
  InvoiceHeader,
  InvoiceHeaderPatch,
  InvoiceLinePatch,
  InvoiceLineRecord,
  InvoiceLineRepository,
  InvoiceRepository,
  InvoiceTotals,
  LedgerEntryFilter,
  LedgerEntryPatch,
  LedgerEntryRepository,
  NewAccount,
  NewClient,
  NewInvoiceLine,
  NewLedgerEntry,
  NewPeriod,
  NewProduct,
  NewTransaction,
  Page,
  PeriodPatch,
  PeriodRecord,
  PeriodRepository,
  ProductPatch,
  ProductRepository,
  TransactionFilter,
  TransactionPatch,
  TransactionRepository,
  UnitOfWork,
} from "../types.js";
import {
  toAccount,
  toClient,
  toInvoice,
  toInvoiceLine,
  toLedgerEntry,
  toPeriod,
  toProduct,
  toStored,
  toTransaction,
} from "./mappers.js";

type SessionOptions = { session?: ClientSession };

// A lock bumps the revision only; the row itself is not edited.
const LOCK_UPDATE = { new: true, timestamps: false } as const;

const ENTRY_DECIMALS = ["debit", "credit"] as const;
const PRODUCT_DECIMALS = ["unitPrice", "currentStock", "minimumStock"] as const;
const INVOICE_DECIMALS = ["discount", "subtotal", "tax", "grandTotal"] as const;
const LINE_DECIMALS = [
  "quantity",
  "unitPrice",
  "discountPercentage",
  "discountAmount",
  "lineSubtotal",
  "lineTax",
  "lineTotal",
] as const;

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function rangeFilter(range: DateRange): Record<string, Date> | undefined {
  if (!range.from && !range.to) return undefined;
  const out: Record<string, Date> = {};
  if (range.from) out.$gte = range.from;
  if (range.to) out.$lte = range.to;
  return out;
}

function catalogFilter(filter: CatalogFilter = {}): Record<string, unknown> {
  const query: Record<string, unknown> = {};
  if (filter.activeOnly) query.isActive = true;
  if (filter.search) query.name = { $regex: escapeRegex(filter.search), $options: "i" };
  return query;
}

/** Mongo reports unique index violations as error 11000. */
async function guardUnique<T>(entity: EntityName, op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (error) {
    if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
      const [field, value] = Object.entries(error.keyValue ?? {})[0] ?? ["key", "?"];
      throw new DuplicateKeyError(entity, field, String(value));
    }
    throw error;
  }
}

class MongoAccountRepository implements AccountRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await AccountModel.findById(id, null, this.opts).lean<AccountDoc>();
    return doc ? toAccount(doc) : null;
  }

  async findByCode(code: string) {
    const doc = await AccountModel.findOne({ code }, null, this.opts).lean<AccountDoc>();
    return doc ? toAccount(doc) : null;
  }

  async list(filter: { classification?: AccountRecord["classification"] } = {}) {
    const query = filter.classification ? { classification: filter.classification } : {};
    const docs = await AccountModel.find(query, null, this.opts).sort({ code: 1 }).lean<AccountDoc[]>();
    return docs.map(toAccount);
  }

  async lockForUpdate(id: string) {
    const doc = await AccountModel.findByIdAndUpdate(id, { $inc: { revision: 1 } }, { ...this.opts, ...LOCK_UPDATE }).lean<AccountDoc>();
    return doc ? toAccount(doc) : null;
  }

  async insert(input: NewAccount) {
    const [created] = await guardUnique("Account", () => AccountModel.create([toStored(input)], this.opts));
    const found = await this.findById(created._id);
    if (!found) throw new Error(`Account ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: AccountPatch) {
    const doc = await guardUnique("Account", () =>
      AccountModel.findByIdAndUpdate(id, { $set: toStored(patch) }, { ...this.opts, new: true }).lean<AccountDoc>(),
    );
    return doc ? toAccount(doc) : null;
  }

  async delete(id: string) {
    const result = await AccountModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }
}

class MongoPeriodRepository implements PeriodRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await PeriodModel.findById(id, null, this.opts).lean<PeriodDoc>();
    return doc ? toPeriod(doc) : null;
  }

  async list(filter: { state?: PeriodRecord["state"] } = {}) {
    const query = filter.state ? { state: filter.state } : {};
    const docs = await PeriodModel.find(query, null, this.opts).sort({ startDate: -1 }).lean<PeriodDoc[]>();
    return docs.map(toPeriod);
  }

  async lockForUpdate(id: string) {
    const doc = await PeriodModel.findByIdAndUpdate(id, { $inc: { revision: 1 } }, { ...this.opts, ...LOCK_UPDATE }).lean<PeriodDoc>();
    return doc ? toPeriod(doc) : null;
  }

  async insert(input: NewPeriod) {
    const [created] = await PeriodModel.create([toStored(input)], this.opts);
    const found = await this.findById(created._id);
    if (!found) throw new Error(`Period ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: PeriodPatch) {
    const doc = await PeriodModel.findByIdAndUpdate(id, { $set: toStored(patch) }, { ...this.opts, new: true }).lean<PeriodDoc>();
    return doc ? toPeriod(doc) : null;
  }

  async delete(id: string) {
    const result = await PeriodModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }
}

class MongoTransactionRepository implements TransactionRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await TransactionModel.findById(id, null, this.opts).lean<TransactionDoc>();
    return doc ? toTransaction(doc) : null;
  }

  async list(filter: TransactionFilter, page?: Page) {
    const query: Record<string, unknown> = {};
    if (filter.periodId) query.periodId = filter.periodId;
    if (filter.direction) query.direction = filter.direction;
    const occurredAt = rangeFilter(filter);
    if (occurredAt) query.occurredAt = occurredAt;

    let cursor = TransactionModel.find(query, null, this.opts).sort({ occurredAt: -1 });
    if (page) cursor = cursor.skip(page.skip).limit(page.limit);
    const [docs, total] = await Promise.all([
      cursor.lean<TransactionDoc[]>(),
      TransactionModel.countDocuments(query, this.opts),
    ]);
    return { rows: docs.map(toTransaction), total };
  }

  async countByPeriod(periodId: string) {
    return TransactionModel.countDocuments({ periodId }, this.opts);
  }

  async lockForUpdate(id: string) {
    const doc = await TransactionModel.findByIdAndUpdate(
      id,
      { $inc: { revision: 1 } },
      { ...this.opts, ...LOCK_UPDATE },
    ).lean<TransactionDoc>();
    return doc ? toTransaction(doc) : null;
  }

  async insert(input: NewTransaction) {
    const [created] = await TransactionModel.create([toStored(input)], this.opts);
    const found = await this.findById(created._id);
    if (!found) throw new Error(`Transaction ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: TransactionPatch) {
    const doc = await TransactionModel.findByIdAndUpdate(
      id,
      { $set: toStored(patch) },
      { ...this.opts, new: true },
    ).lean<TransactionDoc>();
    return doc ? toTransaction(doc) : null;
  }

  async delete(id: string) {
    const result = await TransactionModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }
}

class MongoLedgerEntryRepository implements LedgerEntryRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await LedgerEntryModel.findById(id, null, this.opts).lean<LedgerEntryDoc>();
    return doc ? toLedgerEntry(doc) : null;
  }

  async list(filter: LedgerEntryFilter, page?: Page) {
    const query: Record<string, unknown> = {};
    if (filter.transactionId) query.transactionId = filter.transactionId;
    if (filter.accountId) query.accountId = filter.accountId;

    let cursor = LedgerEntryModel.find(query, null, this.opts).sort({ createdAt: 1 });
    if (page) cursor = cursor.skip(page.skip).limit(page.limit);
    const [docs, total] = await Promise.all([
      cursor.lean<LedgerEntryDoc[]>(),
      LedgerEntryModel.countDocuments(query, this.opts),
    ]);
    return { rows: docs.map(toLedgerEntry), total };
  }

  async listByTransactions(transactionIds: string[]) {
    if (transactionIds.length === 0) return [];
    const docs = await LedgerEntryModel.find({ transactionId: { $in: transactionIds } }, null, this.opts)
      .sort({ createdAt: 1 })
      .lean<LedgerEntryDoc[]>();
    return docs.map(toLedgerEntry);
  }

  async countByAccount(accountId: string) {
    return LedgerEntryModel.countDocuments({ accountId }, this.opts);
  }

  async countByTransaction(transactionId: string) {
    return LedgerEntryModel.countDocuments({ transactionId }, this.opts);
  }

  async insert(input: NewLedgerEntry) {
    const [created] = await LedgerEntryModel.create([toStored(input, ENTRY_DECIMALS)], this.opts);
    const found = await this.findById(created._id);
    if (!found) throw new Error(`LedgerEntry ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: LedgerEntryPatch) {
    const doc = await LedgerEntryModel.findByIdAndUpdate(
      id,
      { $set: toStored(patch, ENTRY_DECIMALS) },
      { ...this.opts, new: true },
    ).lean<LedgerEntryDoc>();
    return doc ? toLedgerEntry(doc) : null;
  }

  async delete(id: string) {
    const result = await LedgerEntryModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }

  async deleteByTransaction(transactionId: string) {
    const result = await LedgerEntryModel.deleteMany({ transactionId }, this.opts);
    return result.deletedCount;
  }
}

class MongoClientRepository implements ClientRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await ClientModel.findById(id, null, this.opts).lean<ClientDoc>();
    return doc ? toClient(doc) : null;
  }

  async findByTaxId(taxId: string) {
    const doc = await ClientModel.findOne({ taxId }, null, this.opts).lean<ClientDoc>();
    return doc ? toClient(doc) : null;
  }

  async list(filter?: CatalogFilter) {
    const docs = await ClientModel.find(catalogFilter(filter), null, this.opts).sort({ name: 1 }).lean<ClientDoc[]>();
    return docs.map(toClient);
  }

  async lockForUpdate(id: string) {
    const doc = await ClientModel.findByIdAndUpdate(id, { $inc: { revision: 1 } }, { ...this.opts, ...LOCK_UPDATE }).lean<ClientDoc>();
    return doc ? toClient(doc) : null;
  }

  async insert(input: NewClient) {
    const [created] = await guardUnique("Client", () => ClientModel.create([toStored(input)], this.opts));
    const found = await this.findById(created._id);
    if (!found) throw new Error(`Client ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: ClientPatch) {
    const doc = await guardUnique("Client", () =>
      ClientModel.findByIdAndUpdate(id, { $set: toStored(patch) }, { ...this.opts, new: true }).lean<ClientDoc>(),
    );
    return doc ? toClient(doc) : null;
  }

  async delete(id: string) {
    const result = await ClientModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }
}

class MongoProductRepository implements ProductRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await ProductModel.findById(id, null, this.opts).lean<ProductDoc>();
    return doc ? toProduct(doc) : null;
  }

  async findByCode(code: string) {
    const doc = await ProductModel.findOne({ code }, null, this.opts).lean<ProductDoc>();
    return doc ? toProduct(doc) : null;
  }

  async list(filter?: CatalogFilter) {
    const docs = await ProductModel.find(catalogFilter(filter), null, this.opts).sort({ name: 1 }).lean<ProductDoc[]>();
    return docs.map(toProduct);
  }

  async lockForUpdate(id: string) {
    const doc = await ProductModel.findByIdAndUpdate(id, { $inc: { revision: 1 } }, { ...this.opts, ...LOCK_UPDATE }).lean<ProductDoc>();
    return doc ? toProduct(doc) : null;
  }

  async insert(input: NewProduct) {
    const [created] = await guardUnique("Product", () =>
      ProductModel.create([toStored(input, PRODUCT_DECIMALS)], this.opts),
    );
    const found = await this.findById(created._id);
    if (!found) throw new Error(`Product ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: ProductPatch) {
    const doc = await guardUnique("Product", () =>
      ProductModel.findByIdAndUpdate(
        id,
        { $set: toStored(patch, PRODUCT_DECIMALS) },
        { ...this.opts, new: true },
      ).lean<ProductDoc>(),
    );
    return doc ? toProduct(doc) : null;
  }

  async delete(id: string) {
    const result = await ProductModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }
}

class MongoInvoiceRepository implements InvoiceRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await InvoiceModel.findById(id, null, this.opts).lean<InvoiceDoc>();
    return doc ? toInvoice(doc) : null;
  }

  async findByNumber(invoiceNumber: string) {
    const doc = await InvoiceModel.findOne({ invoiceNumber }, null, this.opts).lean<InvoiceDoc>();
    return doc ? toInvoice(doc) : null;
  }

  async findMaxSequence(stem: string) {
    const [top] = await InvoiceModel.aggregate<{ sequence: number }>([
      { $match: { invoiceNumber: { $regex: `^${escapeRegex(stem)}\\d+$` } } },
      { $project: { sequence: { $toLong: { $substrCP: ["$invoiceNumber", stem.length, 32] } } } },
      { $sort: { sequence: -1 } },
      { $limit: 1 },
    ]).session(this.opts.session ?? null);
    return top ? Number(top.sequence) : 0;
  }

  async list(filter: InvoiceFilter, page?: Page) {
    const query: Record<string, unknown> = {};
    if (filter.clientId) query.clientId = filter.clientId;
    const issuedAt = rangeFilter(filter);
    if (issuedAt) query.issuedAt = issuedAt;

    let cursor = InvoiceModel.find(query, null, this.opts).sort({ issuedAt: -1 });
    if (page) cursor = cursor.skip(page.skip).limit(page.limit);
    const [docs, total] = await Promise.all([
      cursor.lean<InvoiceDoc[]>(),
      InvoiceModel.countDocuments(query, this.opts),
    ]);
    return { rows: docs.map(toInvoice), total };
  }

  async countByClient(clientId: string) {
    return InvoiceModel.countDocuments({ clientId }, this.opts);
  }

  async countByTransaction(transactionId: string) {
    return InvoiceModel.countDocuments({ transactionId }, this.opts);
  }

  async lockForUpdate(id: string) {
    const doc = await InvoiceModel.findByIdAndUpdate(id, { $inc: { revision: 1 } }, { ...this.opts, ...LOCK_UPDATE }).lean<InvoiceDoc>();
    return doc ? toInvoice(doc) : null;
  }

  async insert(input: InvoiceHeader) {
    const [created] = await guardUnique("Invoice", () =>
      InvoiceModel.create([toStored(input, INVOICE_DECIMALS)], this.opts),
    );
    const found = await this.findById(created._id);
    if (!found) throw new Error(`Invoice ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: InvoiceHeaderPatch) {
    const doc = await guardUnique("Invoice", () =>
      InvoiceModel.findByIdAndUpdate(
        id,
        { $set: toStored(patch, INVOICE_DECIMALS) },
        { ...this.opts, new: true },
      ).lean<InvoiceDoc>(),
    );
    return doc ? toInvoice(doc) : null;
  }

  async delete(id: string) {
    const result = await InvoiceModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }

  async [writeTotals](id: string, totals: InvoiceTotals, expectedRevision: number) {
    const doc = await InvoiceModel.findOneAndUpdate(
      { _id: id, revision: expectedRevision },
      { $set: toStored(totals, INVOICE_DECIMALS) },
      { ...this.opts, new: true },
    ).lean<InvoiceDoc>();
    if (!doc) {
      throw new ConcurrencyConflict(`Invoice ${id} changed while its totals were being recomputed`, {
        expectedRevision,
      });
    }
    return toInvoice(doc);
  }
}

class MongoInvoiceLineRepository implements InvoiceLineRepository {
  constructor(private readonly opts: SessionOptions) {}

  async findById(id: string) {
    const doc = await InvoiceLineModel.findById(id, null, this.opts).lean<InvoiceLineDoc>();
    return doc ? toInvoiceLine(doc) : null;
  }

  async listByInvoice(invoiceId: string) {
    const docs = await InvoiceLineModel.find({ invoiceId }, null, this.opts)
      .sort({ createdAt: 1 })
      .lean<InvoiceLineDoc[]>();
    return docs.map(toInvoiceLine);
  }

  async countByProduct(productId: string) {
    return InvoiceLineModel.countDocuments({ productId }, this.opts);
  }

  async insert(input: NewInvoiceLine) {
    const [created] = await InvoiceLineModel.create([toStored(input, LINE_DECIMALS)], this.opts);
    const found = await this.findById(created._id);
    if (!found) throw new Error(`InvoiceLine ${created._id} vanished after insert`);
    return found;
  }

  async update(id: string, patch: InvoiceLinePatch): Promise<InvoiceLineRecord | null> {
    const doc = await InvoiceLineModel.findByIdAndUpdate(
      id,
      { $set: toStored(patch, LINE_DECIMALS) },
      { ...this.opts, new: true },
    ).lean<InvoiceLineDoc>();
    return doc ? toInvoiceLine(doc) : null;
  }

  async delete(id: string) {
    const result = await InvoiceLineModel.deleteOne({ _id: id }, this.opts);
    return result.deletedCount > 0;
  }

  async deleteByInvoice(invoiceId: string) {
    const result = await InvoiceLineModel.deleteMany({ invoiceId }, this.opts);
    return result.deletedCount;
  }
}

/** Repositories bound to one session; `null` reads committed data outside a transaction. */
export function createMongoRepositories(session: ClientSession | null): UnitOfWork {
  const opts: SessionOptions = session ? { session } : {};
  return {
    accounts: new MongoAccountRepository(opts),
    periods: new MongoPeriodRepository(opts),
    transactions: new MongoTransactionRepository(opts),
    entries: new MongoLedgerEntryRepository(opts),
    clients: new MongoClientRepository(opts),
    products: new MongoProductRepository(opts),
    invoices: new MongoInvoiceRepository(opts),
    invoiceLines: new MongoInvoiceLineRepository(opts),
  };
}

