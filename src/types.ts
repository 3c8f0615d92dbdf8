import type { LedgerStore } from "./store/types.js";

export interface LoggerLike {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
}

export interface LedgerSettings {
  /** Global tax rate applied to taxable invoice lines, e.g. "0.13". */
  taxRate: string;
  invoiceNumberPrefix: string;
  allowTransactionCascadeDelete: boolean;
}

/** What every service function receives. */
export interface LedgerContext {
  store: LedgerStore;
  settings: LedgerSettings;
  log: LoggerLike;
}
