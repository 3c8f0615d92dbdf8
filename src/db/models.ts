export { AccountModel, type AccountDoc } from "./models/account.model.js";
export { PeriodModel, type PeriodDoc } from "./models/period.model.js";
export { TransactionModel, type TransactionDoc } from "./models/transaction.model.js";
export { LedgerEntryModel, type LedgerEntryDoc } from "./models/ledger-entry.model.js";
export { ClientModel, type ClientDoc } from "./models/client.model.js";
export { ProductModel, type ProductDoc } from "./models/product.model.js";
export { InvoiceModel, type InvoiceDoc } from "./models/invoice.model.js";
export { InvoiceLineModel, type InvoiceLineDoc } from "./models/invoice-line.model.js";
