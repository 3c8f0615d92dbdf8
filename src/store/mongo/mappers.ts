import type {
  AccountDoc,
  ClientDoc,
  InvoiceDoc,
  InvoiceLineDoc,
  LedgerEntryDoc,
  PeriodDoc,
  ProductDoc,
  TransactionDoc,
} from "../../db/models.js";
import { decimalToString, toDecimal } from "../../utils/decimal.js";
import {
  accountClassifications,
  clientTypes,
  paymentTerms,
  periodStates,
  periodTypes,
  productTypes,
  transactionDirections,
} from "../../utils/constants.js";
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

function oneOf<T extends string>(allowed: readonly T[], value: string | null | undefined, field: string): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) throw new Error(`Unexpected stored value for ${field}: ${String(value)}`);
  return match;
}

export function toAccount(doc: AccountDoc): AccountRecord {
  return {
    id: doc._id,
    code: doc.code,
    name: doc.name,
    classification: oneOf(accountClassifications, doc.classification, "classification"),
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toPeriod(doc: PeriodDoc): PeriodRecord {
  return {
    id: doc._id,
    startDate: doc.startDate,
    endDate: doc.endDate,
    periodType: oneOf(periodTypes, doc.periodType, "periodType"),
    state: oneOf(periodStates, doc.state, "state"),
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toTransaction(doc: TransactionDoc): TransactionRecord {
  return {
    id: doc._id,
    occurredAt: doc.occurredAt,
    description: doc.description,
    direction: oneOf(transactionDirections, doc.direction, "direction"),
    currency: doc.currency ?? "USD",
    createdBy: doc.createdBy,
    periodId: doc.periodId ?? null,
    category: doc.category ?? null,
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toLedgerEntry(doc: LedgerEntryDoc): LedgerEntryRecord {
  return {
    id: doc._id,
    transactionId: doc.transactionId,
    accountId: doc.accountId,
    debit: decimalToString(doc.debit),
    credit: decimalToString(doc.credit),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toClient(doc: ClientDoc): ClientRecord {
  return {
    id: doc._id,
    name: doc.name,
    taxId: doc.taxId ?? null,
    address: doc.address ?? null,
    phone: doc.phone ?? null,
    email: doc.email ?? null,
    clientType: oneOf(clientTypes, doc.clientType, "clientType"),
    notes: doc.notes ?? null,
    isActive: doc.isActive ?? true,
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toProduct(doc: ProductDoc): ProductRecord {
  return {
    id: doc._id,
    code: doc.code ?? null,
    name: doc.name,
    description: doc.description ?? null,
    productType: oneOf(productTypes, doc.productType, "productType"),
    category: doc.category ?? null,
    unitPrice: decimalToString(doc.unitPrice),
    unitOfMeasure: doc.unitOfMeasure ?? "unit",
    currentStock: decimalToString(doc.currentStock),
    minimumStock: decimalToString(doc.minimumStock),
    taxable: doc.taxable ?? true,
    isActive: doc.isActive ?? true,
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toInvoice(doc: InvoiceDoc): InvoiceRecord {
  return {
    id: doc._id,
    invoiceNumber: doc.invoiceNumber,
    clientId: doc.clientId ?? null,
    transactionId: doc.transactionId ?? null,
    subtotal: decimalToString(doc.subtotal),
    tax: decimalToString(doc.tax),
    grandTotal: decimalToString(doc.grandTotal),
    discount: decimalToString(doc.discount),
    paymentTerms: oneOf(paymentTerms, doc.paymentTerms, "paymentTerms"),
    salesperson: doc.salesperson ?? null,
    issuedAt: doc.issuedAt,
    dueAt: doc.dueAt ?? null,
    notes: doc.notes ?? null,
    revision: doc.revision ?? 0,
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

export function toInvoiceLine(doc: InvoiceLineDoc): InvoiceLineRecord {
  return {
    id: doc._id,
    invoiceId: doc.invoiceId,
    productId: doc.productId,
    description: doc.description ?? null,
    quantity: decimalToString(doc.quantity),
    unitPrice: decimalToString(doc.unitPrice),
    discountPercentage: decimalToString(doc.discountPercentage),
    discountAmount: decimalToString(doc.discountAmount),
    lineSubtotal: decimalToString(doc.lineSubtotal),
    lineTax: decimalToString(doc.lineTax),
    lineTotal: decimalToString(doc.lineTotal),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

/**
 * Drop undefined keys and turn the named decimal-string fields into
 * Decimal128, ready for `create` or `$set`.
 */
export function toStored(input: object, decimalFields: readonly string[] = []): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value === undefined) continue;
    out[key] = decimalFields.includes(key) && typeof value === "string" ? toDecimal(value) : value;
  }
  return out;
}
