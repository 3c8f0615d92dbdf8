import type { LedgerContext } from "../../../types.js";
import type { ProductRecord } from "../../../store/types.js";
import type { ProductType } from "../../../utils/constants.js";
import { ConstraintViolation, NotFoundError, ReferentialIntegrityError } from "../../../utils/errors.js";
import {
  compareAmounts,
  fromScaled,
  MONEY_SCALE,
  multiplyScaled,
  normalizeAmount,
  RATE_SCALE,
  toScaled,
  ZERO_AMOUNT,
} from "../../../utils/money.js";
import type {
  ListProductsQuery,
  ProductCreatePayload,
  ProductUpdatePayload,
  StockAdjustmentPayload,
} from "../schemas/products.schemas.js";

function normalizeNonNegative(value: string, field: string, label: string): string {
  const amount = normalizeAmount(value);
  if (compareAmounts(amount, ZERO_AMOUNT) < 0) {
    throw new ConstraintViolation(`${label} must not be negative`, { [field]: value });
  }
  return amount;
}

function normalizePrice(value: string): string {
  return normalizeNonNegative(value, "unitPrice", "Unit price");
}

function assertStockFits(productType: ProductType, currentStock: string, minimumStock: string) {
  if (productType === "service" && (currentStock !== ZERO_AMOUNT || minimumStock !== ZERO_AMOUNT)) {
    throw new ConstraintViolation("Services carry no stock", { currentStock, minimumStock });
  }
}

export async function createProduct(ctx: LedgerContext, payload: ProductCreatePayload) {
  const unitPrice = normalizePrice(payload.unitPrice);
  const currentStock = normalizeNonNegative(payload.currentStock, "currentStock", "Stock");
  const minimumStock = normalizeNonNegative(payload.minimumStock, "minimumStock", "Minimum stock");
  assertStockFits(payload.productType, currentStock, minimumStock);

  return ctx.store.write((uow) =>
    uow.products.insert({
      code: payload.code ?? null,
      name: payload.name,
      description: payload.description ?? null,
      productType: payload.productType,
      category: payload.category ?? null,
      unitPrice,
      unitOfMeasure: payload.unitOfMeasure,
      taxable: payload.taxable,
      isActive: payload.isActive,
      currentStock,
      minimumStock,
    }),
  );
}

export async function getProduct(ctx: LedgerContext, id: string) {
  const product = await ctx.store.read((readers) => readers.products.findById(id));
  if (!product) throw new NotFoundError("Product", id);
  return product;
}

export async function getProductByCode(ctx: LedgerContext, code: string) {
  const product = await ctx.store.read((readers) => readers.products.findByCode(code));
  if (!product) throw new NotFoundError("Product", code);
  return product;
}

export async function listProducts(ctx: LedgerContext, query: ListProductsQuery) {
  return ctx.store.read((readers) => readers.products.list(query));
}

/**
 * Price and tax-flag changes apply to lines added or edited afterwards;
 * existing lines keep the values they were computed with.
 */
export async function updateProduct(ctx: LedgerContext, id: string, payload: ProductUpdatePayload) {
  const unitPrice = payload.unitPrice === undefined ? undefined : normalizePrice(payload.unitPrice);
  const currentStock =
    payload.currentStock === undefined ? undefined : normalizeNonNegative(payload.currentStock, "currentStock", "Stock");
  const minimumStock =
    payload.minimumStock === undefined
      ? undefined
      : normalizeNonNegative(payload.minimumStock, "minimumStock", "Minimum stock");

  return ctx.store.write(async (uow) => {
    const current = await uow.products.lockForUpdate(id);
    if (!current) throw new NotFoundError("Product", id);
    assertStockFits(
      payload.productType ?? current.productType,
      currentStock ?? current.currentStock,
      minimumStock ?? current.minimumStock,
    );

    const updated = await uow.products.update(id, { ...payload, unitPrice, currentStock, minimumStock });
    if (!updated) throw new NotFoundError("Product", id);
    return updated;
  });
}

export async function deleteProduct(ctx: LedgerContext, id: string) {
  await ctx.store.write(async (uow) => {
    const current = await uow.products.lockForUpdate(id);
    if (!current) throw new NotFoundError("Product", id);

    const references = await uow.invoiceLines.countByProduct(id);
    if (references > 0) throw new ReferentialIntegrityError("Product", id, "InvoiceLine", references);

    await uow.products.delete(id);
  });
  ctx.log.info(`[products] deleted ${id}`);
  return { id, deleted: true };
}

/** Receive (`add`) or issue (`subtract`) stock. Never goes below zero. */
export async function adjustStock(ctx: LedgerContext, id: string, payload: StockAdjustmentPayload) {
  const quantity = toScaled(payload.quantity);
  if (quantity <= 0n) {
    throw new ConstraintViolation("Stock adjustment quantity must be greater than zero", {
      quantity: payload.quantity,
    });
  }

  const updated = await ctx.store.write(async (uow) => {
    const current = await uow.products.lockForUpdate(id);
    if (!current) throw new NotFoundError("Product", id);
    if (current.productType !== "product") {
      throw new ConstraintViolation(`${current.name} is a service and carries no stock`, { productId: id });
    }

    const onHand = toScaled(current.currentStock);
    const next = payload.operation === "add" ? onHand + quantity : onHand - quantity;
    if (next < 0n) {
      throw new ConstraintViolation(`Insufficient stock for ${current.name}`, {
        available: current.currentStock,
        requested: fromScaled(quantity),
      });
    }

    const row = await uow.products.update(id, { currentStock: fromScaled(next) });
    if (!row) throw new NotFoundError("Product", id);
    return row;
  });
  ctx.log.debug(`[products] stock ${payload.operation} ${fromScaled(quantity)} on ${id} -> ${updated.currentStock}`);
  return updated;
}

function isBelowMinimum(product: ProductRecord): boolean {
  return product.productType === "product" && compareAmounts(product.currentStock, product.minimumStock) < 0;
}

/** Active physical products under their minimum, lowest stock first. */
export async function listLowStock(ctx: LedgerContext) {
  const products = await ctx.store.read((readers) => readers.products.list({ activeOnly: true }));
  return products
    .filter(isBelowMinimum)
    .sort((a, b) => compareAmounts(a.currentStock, b.currentStock) || a.name.localeCompare(b.name));
}

export async function productStats(ctx: LedgerContext) {
  const products = await ctx.store.read((readers) => readers.products.list());

  let inventoryValue = 0n;
  for (const product of products) {
    if (product.productType !== "product") continue;
    inventoryValue += multiplyScaled(
      toScaled(product.currentStock),
      MONEY_SCALE,
      toScaled(product.unitPrice),
      MONEY_SCALE,
    );
  }

  const active = products.filter((product) => product.isActive).length;
  return {
    total: products.length,
    products: products.filter((product) => product.productType === "product").length,
    services: products.filter((product) => product.productType === "service").length,
    active,
    inactive: products.length - active,
    lowStock: products.filter(isBelowMinimum).length,
    inventoryValue: fromScaled(inventoryValue),
  };
}

/** Unit price plus tax at the configured rate; untaxed products keep their price. */
export function priceWithTax(product: Pick<ProductRecord, "unitPrice" | "taxable">, taxRate: string) {
  const price = toScaled(product.unitPrice);
  const tax = product.taxable ? multiplyScaled(price, MONEY_SCALE, toScaled(taxRate, RATE_SCALE), RATE_SCALE) : 0n;
  return {
    unitPrice: fromScaled(price),
    taxRate: product.taxable ? taxRate : "0",
    tax: fromScaled(tax),
    priceWithTax: fromScaled(price + tax),
  };
}

export async function getProductPrice(ctx: LedgerContext, id: string) {
  const product = await getProduct(ctx, id);
  return { productId: product.id, ...priceWithTax(product, ctx.settings.taxRate) };
}
