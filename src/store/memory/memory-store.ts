/**
 * In-process LedgerStore.
 *
 * Suitable for tests, local development and demos; all state is lost on
 * exit. Units of work stage their writes and apply them synchronously on
 * commit, so a reader never observes a line without its recomputed invoice
 * totals. Row locks are per-key FIFO mutexes held until the unit ends.
 */

import type { LoggerLike } from "../../types.js";
import { KeyedLock } from "../keyed-lock.js";
import type { LedgerStore, Readers, UnitOfWork } from "../types.js";
import { createMemoryTables, MemoryUnit, type MemoryTables } from "./memory-unit.js";
import { createMemoryRepositories } from "./repositories.js";

export interface MemoryStoreOptions {
  lockTimeoutMs: number;
  log: LoggerLike;
}

export class MemoryLedgerStore implements LedgerStore {
  readonly driver = "memory" as const;
  private readonly tables: MemoryTables = createMemoryTables();
  private readonly locks = new KeyedLock();

  constructor(private readonly options: MemoryStoreOptions) {}

  async read<T>(fn: (readers: Readers) => Promise<T>): Promise<T> {
    // Never committed: whatever a reader stages is dropped.
    const unit = new MemoryUnit(this.tables, this.locks, this.options.lockTimeoutMs);
    return fn(createMemoryRepositories(unit));
  }

  async write<T>(fn: (uow: UnitOfWork) => Promise<T>): Promise<T> {
    const unit = new MemoryUnit(this.tables, this.locks, this.options.lockTimeoutMs);
    try {
      const result = await fn(createMemoryRepositories(unit));
      unit.commit();
      return result;
    } catch (error) {
      if (unit.hasChanges) {
        this.options.log.debug(`[store] unit of work rolled back (locks: ${unit.lockedKeys.join(", ") || "none"})`);
      }
      throw error;
    } finally {
      unit.releaseLocks();
    }
  }

  /** Committed row counts, for diagnostics and tests. */
  size(): Record<keyof MemoryTables, number> {
    return {
      accounts: this.tables.accounts.rows.size,
      periods: this.tables.periods.rows.size,
      transactions: this.tables.transactions.rows.size,
      entries: this.tables.entries.rows.size,
      clients: this.tables.clients.rows.size,
      products: this.tables.products.rows.size,
      invoices: this.tables.invoices.rows.size,
      invoiceLines: this.tables.invoiceLines.rows.size,
    };
  }

  async close(): Promise<void> {
    for (const table of Object.values(this.tables)) table.rows.clear();
  }
}
