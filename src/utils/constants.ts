export const accountClassifications = [
  "asset",
  "liability",
  "equity",
  "income",
  "expense",
] as const;
export type AccountClassification = (typeof accountClassifications)[number];

export const periodTypes = ["monthly", "quarterly", "annual"] as const;
export type PeriodType = (typeof periodTypes)[number];

export const periodStates = ["open", "closed"] as const;
export type PeriodState = (typeof periodStates)[number];

export const transactionDirections = ["income", "expense"] as const;
export type TransactionDirection = (typeof transactionDirections)[number];

export const clientTypes = ["individual", "company"] as const;
export type ClientType = (typeof clientTypes)[number];

export const productTypes = ["product", "service"] as const;
export type ProductType = (typeof productTypes)[number];

export const stockOperations = ["add", "subtract"] as const;
export type StockOperation = (typeof stockOperations)[number];

// Net terms carry their due-date offset in days; cash invoices have no due date.
export const paymentTerms = ["cash", "net_15", "net_30", "net_60"] as const;
export type PaymentTerms = (typeof paymentTerms)[number];

export const paymentTermDays: Record<PaymentTerms, number | null> = {
  cash: null,
  net_15: 15,
  net_30: 30,
  net_60: 60,
};

export const storeDrivers = ["mongo", "memory"] as const;
export type StoreDriver = (typeof storeDrivers)[number];
