import type {
  AccountClassification,
  ClientType,
  PaymentTerms,
  PeriodState,
  PeriodType,
  ProductType,
  TransactionDirection,
} from "../utils/constants.js";
import { writeTotals } from "./capabilities.js";

interface Timestamps {
  createdAt: Date;
  updatedAt: Date;
}

/** Monotonic row version, bumped by every `lockForUpdate`. */
interface Versioned {
  revision: number;
}

export interface AccountRecord extends Timestamps, Versioned {
  id: string;
  code: string;
  name: string;
  classification: AccountClassification;
}

export interface PeriodRecord extends Timestamps, Versioned {
  id: string;
  startDate: Date;
  endDate: Date;
  periodType: PeriodType;
  state: PeriodState;
}

export interface TransactionRecord extends Timestamps, Versioned {
  id: string;
  occurredAt: Date;
  description: string;
  direction: TransactionDirection;
  currency: string;
  createdBy: string;
  periodId: string | null;
  category: string | null;
}

export interface LedgerEntryRecord extends Timestamps {
  id: string;
  transactionId: string;
  accountId: string;
  debit: string;
  credit: string;
}

export interface ClientRecord extends Timestamps, Versioned {
  id: string;
  name: string;
  taxId: string | null;
  address: string | null;
  phone: string | null;
  email: string | null;
  clientType: ClientType;
  notes: string | null;
  isActive: boolean;
}

export interface ProductRecord extends Timestamps, Versioned {
  id: string;
  code: string | null;
  name: string;
  description: string | null;
  productType: ProductType;
  category: string | null;
  unitPrice: string;
  unitOfMeasure: string;
  taxable: boolean;
  /** On-hand quantity; always "0.00" for services. */
  currentStock: string;
  minimumStock: string;
  isActive: boolean;
}

export interface InvoiceTotals {
  subtotal: string;
  tax: string;
  grandTotal: string;
}

export interface InvoiceRecord extends InvoiceTotals, Timestamps, Versioned {
  id: string;
  invoiceNumber: string;
  clientId: string | null;
  transactionId: string | null;
  discount: string;
  paymentTerms: PaymentTerms;
  salesperson: string | null;
  issuedAt: Date;
  dueAt: Date | null;
  notes: string | null;
}

export interface LineAggregate {
  discountAmount: string;
  lineSubtotal: string;
  lineTax: string;
  lineTotal: string;
}

export interface InvoiceLineRecord extends LineAggregate, Timestamps {
  id: string;
  invoiceId: string;
  productId: string;
  description: string | null;
  quantity: string;
  unitPrice: string;
  discountPercentage: string;
}

type Managed = "id" | "createdAt" | "updatedAt" | "revision";

export type NewAccount = Omit<AccountRecord, Managed>;
export type AccountPatch = Partial<NewAccount>;
export type NewPeriod = Omit<PeriodRecord, Managed>;
export type PeriodPatch = Partial<NewPeriod>;
export type NewTransaction = Omit<TransactionRecord, Managed>;
export type TransactionPatch = Partial<NewTransaction>;
export type NewLedgerEntry = Omit<LedgerEntryRecord, Managed>;
export type LedgerEntryPatch = Partial<NewLedgerEntry>;
export type NewClient = Omit<ClientRecord, Managed>;
export type ClientPatch = Partial<NewClient>;
export type NewProduct = Omit<ProductRecord, Managed>;
export type ProductPatch = Partial<NewProduct>;

/** Header fields a caller may set. Aggregates are written only through `writeTotals`. */
export type InvoiceHeader = Omit<InvoiceRecord, Managed | keyof InvoiceTotals>;
export type InvoiceHeaderPatch = Partial<InvoiceHeader>;
export type NewInvoiceLine = Omit<InvoiceLineRecord, Managed>;
export type InvoiceLinePatch = Partial<Omit<NewInvoiceLine, "invoiceId">>;

export interface Page {
  skip: number;
  limit: number;
}

export interface PageResult<T> {
  rows: T[];
  total: number;
}

export interface DateRange {
  from?: Date;
  to?: Date;
}

// ── Readers ──────────────────────────────────────────────────────────

export interface AccountReader {
  findById(id: string): Promise<AccountRecord | null>;
  findByCode(code: string): Promise<AccountRecord | null>;
  list(filter?: { classification?: AccountClassification }): Promise<AccountRecord[]>;
}

export interface PeriodReader {
  findById(id: string): Promise<PeriodRecord | null>;
  list(filter?: { state?: PeriodState }): Promise<PeriodRecord[]>;
}

export interface TransactionFilter extends DateRange {
  periodId?: string;
  direction?: TransactionDirection;
}

export interface TransactionReader {
  findById(id: string): Promise<TransactionRecord | null>;
  list(filter: TransactionFilter, page?: Page): Promise<PageResult<TransactionRecord>>;
  countByPeriod(periodId: string): Promise<number>;
}

export interface LedgerEntryFilter {
  transactionId?: string;
  accountId?: string;
}

export interface LedgerEntryReader {
  findById(id: string): Promise<LedgerEntryRecord | null>;
  list(filter: LedgerEntryFilter, page?: Page): Promise<PageResult<LedgerEntryRecord>>;
  listByTransactions(transactionIds: string[]): Promise<LedgerEntryRecord[]>;
  countByAccount(accountId: string): Promise<number>;
  countByTransaction(transactionId: string): Promise<number>;
}

export interface CatalogFilter {
  search?: string;
  activeOnly?: boolean;
}

export interface ClientReader {
  findById(id: string): Promise<ClientRecord | null>;
  findByTaxId(taxId: string): Promise<ClientRecord | null>;
  list(filter?: CatalogFilter): Promise<ClientRecord[]>;
}

export interface ProductReader {
  findById(id: string): Promise<ProductRecord | null>;
  findByCode(code: string): Promise<ProductRecord | null>;
  list(filter?: CatalogFilter): Promise<ProductRecord[]>;
}

export interface InvoiceFilter extends DateRange {
  clientId?: string;
}

export interface InvoiceReader {
  findById(id: string): Promise<InvoiceRecord | null>;
  findByNumber(invoiceNumber: string): Promise<InvoiceRecord | null>;
  /**
   * Highest N among invoice numbers of the exact form `<stem><digits>`,
   * compared numerically; 0 when there are none.
   */
  findMaxSequence(stem: string): Promise<number>;
  list(filter: InvoiceFilter, page?: Page): Promise<PageResult<InvoiceRecord>>;
  countByClient(clientId: string): Promise<number>;
  countByTransaction(transactionId: string): Promise<number>;
}

export interface InvoiceLineReader {
  findById(id: string): Promise<InvoiceLineRecord | null>;
  listByInvoice(invoiceId: string): Promise<InvoiceLineRecord[]>;
  countByProduct(productId: string): Promise<number>;
}

// ── Repositories (unit of work only) ─────────────────────────────────

/**
 * Lock a row for the rest of the unit of work and bump its revision.
 * Resolves null when the row does not exist.
 */
interface Lockable<T> {
  lockForUpdate(id: string): Promise<T | null>;
}

interface Writable<TRecord, TNew, TPatch> {
  insert(input: TNew): Promise<TRecord>;
  update(id: string, patch: TPatch): Promise<TRecord | null>;
  delete(id: string): Promise<boolean>;
}

export interface AccountRepository
  extends AccountReader,
    Lockable<AccountRecord>,
    Writable<AccountRecord, NewAccount, AccountPatch> {}

export interface PeriodRepository
  extends PeriodReader,
    Lockable<PeriodRecord>,
    Writable<PeriodRecord, NewPeriod, PeriodPatch> {}

export interface TransactionRepository
  extends TransactionReader,
    Lockable<TransactionRecord>,
    Writable<TransactionRecord, NewTransaction, TransactionPatch> {}

export interface LedgerEntryRepository
  extends LedgerEntryReader,
    Writable<LedgerEntryRecord, NewLedgerEntry, LedgerEntryPatch> {
  deleteByTransaction(transactionId: string): Promise<number>;
}

export interface ClientRepository
  extends ClientReader,
    Lockable<ClientRecord>,
    Writable<ClientRecord, NewClient, ClientPatch> {}

export interface ProductRepository
  extends ProductReader,
    Lockable<ProductRecord>,
    Writable<ProductRecord, NewProduct, ProductPatch> {}

export interface InvoiceRepository
  extends InvoiceReader,
    Lockable<InvoiceRecord>,
    Writable<InvoiceRecord, InvoiceHeader, InvoiceHeaderPatch> {
  /**
   * Persist derived totals. Fails with ConcurrencyConflict when the stored
   * revision differs from `expectedRevision`.
   */
  [writeTotals](id: string, totals: InvoiceTotals, expectedRevision: number): Promise<InvoiceRecord>;
}

export interface InvoiceLineRepository
  extends InvoiceLineReader,
    Writable<InvoiceLineRecord, NewInvoiceLine, InvoiceLinePatch> {
  deleteByInvoice(invoiceId: string): Promise<number>;
}

export interface Readers {
  accounts: AccountReader;
  periods: PeriodReader;
  transactions: TransactionReader;
  entries: LedgerEntryReader;
  clients: ClientReader;
  products: ProductReader;
  invoices: InvoiceReader;
  invoiceLines: InvoiceLineReader;
}

export interface UnitOfWork extends Readers {
  accounts: AccountRepository;
  periods: PeriodRepository;
  transactions: TransactionRepository;
  entries: LedgerEntryRepository;
  clients: ClientRepository;
  products: ProductRepository;
  invoices: InvoiceRepository;
  invoiceLines: InvoiceLineRepository;
}

export interface LedgerStore {
  readonly driver: "mongo" | "memory";
  /** Committed data only; no locks. */
  read<T>(fn: (readers: Readers) => Promise<T>): Promise<T>;
  /** Atomic unit of work: every write inside `fn` commits together or not at all. */
  write<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
