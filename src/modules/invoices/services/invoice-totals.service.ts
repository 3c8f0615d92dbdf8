import { writeTotals } from "../../../store/capabilities.js";
import type { InvoiceRecord, InvoiceTotals, LineAggregate, UnitOfWork } from "../../../store/types.js";
import { NotFoundError } from "../../../utils/errors.js";
import { sumAmounts } from "../../../utils/money.js";

export function sumLines(lines: ReadonlyArray<Pick<LineAggregate, "lineSubtotal" | "lineTax" | "lineTotal">>): InvoiceTotals {
  return {
    subtotal: sumAmounts(lines.map((line) => line.lineSubtotal)),
    tax: sumAmounts(lines.map((line) => line.lineTax)),
    grandTotal: sumAmounts(lines.map((line) => line.lineTotal)),
  };
}

/**
 * Re-derive subtotal, tax and grandTotal from the invoice's current lines.
 *
 * Must run in the unit of work that mutated the lines, so the mutation and
 * the new totals commit together. The header lock taken here (re-entrant if
 * the caller already holds it) serializes concurrent line mutations on the
 * same invoice. The header `discount` is left as the caller set it.
 */
export async function recomputeInvoiceTotals(uow: UnitOfWork, invoiceId: string): Promise<InvoiceRecord> {
  const invoice = await uow.invoices.lockForUpdate(invoiceId);
  if (!invoice) throw new NotFoundError("Invoice", invoiceId);

  const lines = await uow.invoiceLines.listByInvoice(invoiceId);
  return uow.invoices[writeTotals](invoiceId, sumLines(lines), invoice.revision);
}
