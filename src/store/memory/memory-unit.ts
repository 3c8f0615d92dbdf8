import type { KeyedLock } from "../keyed-lock.js";
import type {
  AccountRecord,
  ClientRecord,
  InvoiceLineRecord,
  InvoiceRecord,
  LedgerEntryRecord,
  PeriodRecord,
  ProductRecord,
  TransactionRecord,
} from "../types.js";
import { MemoryTable, TableView } from "./table.js";

export interface MemoryTables {
  accounts: MemoryTable<AccountRecord>;
  periods: MemoryTable<PeriodRecord>;
  transactions: MemoryTable<TransactionRecord>;
  entries: MemoryTable<LedgerEntryRecord>;
  clients: MemoryTable<ClientRecord>;
  products: MemoryTable<ProductRecord>;
  invoices: MemoryTable<InvoiceRecord>;
  invoiceLines: MemoryTable<InvoiceLineRecord>;
}

export function createMemoryTables(): MemoryTables {
  return {
    accounts: new MemoryTable<AccountRecord>("Account", ["code"]),
    periods: new MemoryTable<PeriodRecord>("Period"),
    transactions: new MemoryTable<TransactionRecord>("Transaction"),
    entries: new MemoryTable<LedgerEntryRecord>("LedgerEntry"),
    clients: new MemoryTable<ClientRecord>("Client", ["taxId"]),
    products: new MemoryTable<ProductRecord>("Product", ["code"]),
    invoices: new MemoryTable<InvoiceRecord>("Invoice", ["invoiceNumber"]),
    invoiceLines: new MemoryTable<InvoiceLineRecord>("InvoiceLine"),
  };
}

type Views = { [K in keyof MemoryTables]: MemoryTables[K] extends MemoryTable<infer T> ? TableView<T> : never };

/** Staged writes and held locks of one `read` or `write` call. */
export class MemoryUnit {
  readonly views: Views;
  private readonly releases = new Map<string, () => void>();

  constructor(
    tables: MemoryTables,
    private readonly locks: KeyedLock,
    private readonly lockTimeoutMs: number,
  ) {
    this.views = {
      accounts: new TableView(tables.accounts),
      periods: new TableView(tables.periods),
      transactions: new TableView(tables.transactions),
      entries: new TableView(tables.entries),
      clients: new TableView(tables.clients),
      products: new TableView(tables.products),
      invoices: new TableView(tables.invoices),
      invoiceLines: new TableView(tables.invoiceLines),
    };
  }

  /** Re-entrant: a key already held by this unit is not acquired twice. */
  async lock(key: string): Promise<void> {
    if (this.releases.has(key)) return;
    const release = await this.locks.acquire(key, this.lockTimeoutMs);
    this.releases.set(key, release);
  }

  get lockedKeys(): string[] {
    return [...this.releases.keys()];
  }

  get hasChanges(): boolean {
    return Object.values(this.views).some((view) => view.hasChanges);
  }

  /** Validate every table first so a failing unique check applies nothing. */
  commit(): void {
    const views = Object.values(this.views);
    for (const view of views) view.validate();
    for (const view of views) view.apply();
  }

  releaseLocks(): void {
    for (const release of this.releases.values()) release();
    this.releases.clear();
  }
}
