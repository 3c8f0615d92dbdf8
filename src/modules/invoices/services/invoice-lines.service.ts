import type { LedgerContext, LedgerSettings } from "../../../types.js";
import type { InvoiceLineRecord, UnitOfWork } from "../../../store/types.js";
import { ConstraintViolation, NotFoundError } from "../../../utils/errors.js";
import { compareAmounts, ZERO_AMOUNT } from "../../../utils/money.js";
import type {
  InvoiceLineCreatePayload,
  InvoiceLineUpdatePayload,
} from "../schemas/invoices.schemas.js";
import { recomputeInvoiceTotals } from "./invoice-totals.service.js";
import { computeLine } from "./line-aggregator.js";

async function lockProduct(uow: UnitOfWork, productId: string, requireActive: boolean) {
  const product = await uow.products.lockForUpdate(productId);
  if (!product) throw new NotFoundError("Product", productId);
  if (requireActive && !product.isActive) {
    throw new ConstraintViolation(`Product ${product.name} is inactive`, { productId });
  }
  return product;
}

async function lockInvoice(uow: UnitOfWork, invoiceId: string) {
  const invoice = await uow.invoices.lockForUpdate(invoiceId);
  if (!invoice) throw new NotFoundError("Invoice", invoiceId);
  return invoice;
}

async function findLine(uow: UnitOfWork, invoiceId: string, lineId: string): Promise<InvoiceLineRecord> {
  const line = await uow.invoiceLines.findById(lineId);
  if (!line || line.invoiceId !== invoiceId) throw new NotFoundError("InvoiceLine", lineId);
  return line;
}

/** Insert one line; the caller recomputes the invoice totals in the same unit. */
export async function insertLine(
  uow: UnitOfWork,
  settings: LedgerSettings,
  invoiceId: string,
  payload: InvoiceLineCreatePayload,
): Promise<InvoiceLineRecord> {
  const product = await lockProduct(uow, payload.productId, true);
  const computed = computeLine(
    {
      quantity: payload.quantity,
      unitPrice: payload.unitPrice ?? product.unitPrice,
      discountPercentage: payload.discountPercentage,
      discountAmount: payload.discountAmount,
      taxable: product.taxable,
    },
    settings.taxRate,
  );

  return uow.invoiceLines.insert({
    invoiceId,
    productId: product.id,
    description: payload.description ?? product.name,
    ...computed,
  });
}

export async function addInvoiceLine(ctx: LedgerContext, invoiceId: string, payload: InvoiceLineCreatePayload) {
  return ctx.store.write(async (uow) => {
    await lockInvoice(uow, invoiceId);
    const line = await insertLine(uow, ctx.settings, invoiceId, payload);
    const invoice = await recomputeInvoiceTotals(uow, invoiceId);
    return { line, invoice };
  });
}

export async function listInvoiceLines(ctx: LedgerContext, invoiceId: string) {
  return ctx.store.read(async (readers) => {
    const invoice = await readers.invoices.findById(invoiceId);
    if (!invoice) throw new NotFoundError("Invoice", invoiceId);
    return readers.invoiceLines.listByInvoice(invoiceId);
  });
}

/**
 * Merge the patch over the stored line and recompute every derived field.
 * Switching product takes the new product's price unless one is given. A
 * positive discountPercentage keeps overriding discountAmount; the stored
 * amount it produced is derived and is not carried over once the
 * percentage drops to 0.
 */
export async function updateInvoiceLine(
  ctx: LedgerContext,
  invoiceId: string,
  lineId: string,
  payload: InvoiceLineUpdatePayload,
) {
  return ctx.store.write(async (uow) => {
    await lockInvoice(uow, invoiceId);
    const current = await findLine(uow, invoiceId, lineId);

    const productChanged = payload.productId !== undefined && payload.productId !== current.productId;
    const product = await lockProduct(uow, payload.productId ?? current.productId, productChanged);

    const amountWasDerived = compareAmounts(current.discountPercentage, ZERO_AMOUNT) > 0;
    const computed = computeLine(
      {
        quantity: payload.quantity ?? current.quantity,
        unitPrice: payload.unitPrice ?? (productChanged ? product.unitPrice : current.unitPrice),
        discountPercentage: payload.discountPercentage ?? current.discountPercentage,
        discountAmount: payload.discountAmount ?? (amountWasDerived ? ZERO_AMOUNT : current.discountAmount),
        taxable: product.taxable,
      },
      ctx.settings.taxRate,
    );

    const line = await uow.invoiceLines.update(lineId, {
      productId: product.id,
      description: payload.description === undefined ? current.description : payload.description,
      ...computed,
    });
    if (!line) throw new NotFoundError("InvoiceLine", lineId);

    const invoice = await recomputeInvoiceTotals(uow, invoiceId);
    return { line, invoice };
  });
}

export async function removeInvoiceLine(ctx: LedgerContext, invoiceId: string, lineId: string) {
  return ctx.store.write(async (uow) => {
    await lockInvoice(uow, invoiceId);
    await findLine(uow, invoiceId, lineId);
    await uow.invoiceLines.delete(lineId);
    const invoice = await recomputeInvoiceTotals(uow, invoiceId);
    return { id: lineId, deleted: true, invoice };
  });
}
