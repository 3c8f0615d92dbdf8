import { describe, it, expect } from "vitest";
import { createTestContext, seedProduct } from "../../../__tests__/helpers.js";
import {
  listProductsQuerySchema,
  productCreateSchema,
  productUpdateSchema,
  stockAdjustmentSchema,
} from "../schemas/products.schemas.js";
import {
  adjustStock,
  createProduct,
  deleteProduct,
  getProduct,
  getProductByCode,
  getProductPrice,
  listLowStock,
  listProducts,
  priceWithTax,
  productStats,
  updateProduct,
} from "../services/products.service.js";
import { ConstraintViolation, DuplicateKeyError, NotFoundError } from "../../../utils/errors.js";

describe("product catalog", () => {
  it("applies defaults and normalizes the price", async () => {
    const { ctx } = createTestContext();
    const product = await seedProduct(ctx, { unitPrice: "9.5" });
    expect(product).toMatchObject({
      name: "Widget",
      unitPrice: "9.50",
      productType: "product",
      unitOfMeasure: "unit",
      taxable: true,
      isActive: true,
      code: null,
      currentStock: "0.00",
      minimumStock: "0.00",
    });
  });

  it("rejects a negative price", async () => {
    const { ctx } = createTestContext();
    await expect(seedProduct(ctx, { unitPrice: "-1" })).rejects.toBeInstanceOf(ConstraintViolation);
  });

  it("keeps product codes unique", async () => {
    const { ctx } = createTestContext();
    const payload = productCreateSchema.parse({ code: "SKU-1", name: "Widget", unitPrice: "1" });
    await createProduct(ctx, payload);
    await expect(createProduct(ctx, payload)).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it("filters by name and activity", async () => {
    const { ctx } = createTestContext();
    await seedProduct(ctx, { name: "Blue widget" });
    await seedProduct(ctx, { name: "Red widget", isActive: false });
    await seedProduct(ctx, { name: "Consulting" });

    const active = await listProducts(ctx, listProductsQuerySchema.parse({ search: "WIDGET", activeOnly: "true" }));
    expect(active.map((product) => product.name)).toEqual(["Blue widget"]);

    const all = await listProducts(ctx, listProductsQuerySchema.parse({}));
    expect(all.map((product) => product.name)).toEqual(["Blue widget", "Consulting", "Red widget"]);
  });

  it("updates and deletes", async () => {
    const { ctx } = createTestContext();
    const product = await seedProduct(ctx);
    const updated = await updateProduct(ctx, product.id, productUpdateSchema.parse({ taxable: false }));
    expect(updated.taxable).toBe(false);
    expect(updated.unitPrice).toBe("15.00");

    await deleteProduct(ctx, product.id);
    await expect(getProduct(ctx, product.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("looks a product up by code", async () => {
    const { ctx } = createTestContext();
    const product = await seedProduct(ctx, { code: "SKU-7" });
    expect((await getProductByCode(ctx, "SKU-7")).id).toBe(product.id);
    await expect(getProductByCode(ctx, "SKU-8")).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("product stock", () => {
  it("receives and issues stock", async () => {
    const { ctx } = createTestContext();
    const product = await seedProduct(ctx, { currentStock: "10" });

    const received = await adjustStock(ctx, product.id, stockAdjustmentSchema.parse({ quantity: "2.5" }));
    expect(received.currentStock).toBe("12.50");

    const issued = await adjustStock(ctx, product.id, stockAdjustmentSchema.parse({ quantity: 12, operation: "subtract" }));
    expect(issued.currentStock).toBe("0.50");
  });

  it("refuses to issue more than is on hand", async () => {
    const { ctx } = createTestContext();
    const product = await seedProduct(ctx, { currentStock: "3" });

    await expect(
      adjustStock(ctx, product.id, stockAdjustmentSchema.parse({ quantity: "4", operation: "subtract" })),
    ).rejects.toMatchObject({ details: { available: "3.00", requested: "4.00" } });
    expect((await getProduct(ctx, product.id)).currentStock).toBe("3.00");
  });

  it("rejects stock on services and non-positive adjustments", async () => {
    const { ctx } = createTestContext();
    const service = await seedProduct(ctx, { name: "Consulting", productType: "service" });
    const product = await seedProduct(ctx);

    await expect(adjustStock(ctx, service.id, stockAdjustmentSchema.parse({ quantity: "1" }))).rejects.toBeInstanceOf(
      ConstraintViolation,
    );
    await expect(adjustStock(ctx, product.id, stockAdjustmentSchema.parse({ quantity: "0" }))).rejects.toBeInstanceOf(
      ConstraintViolation,
    );
    await expect(seedProduct(ctx, { productType: "service", currentStock: "5" })).rejects.toBeInstanceOf(
      ConstraintViolation,
    );
    await expect(
      updateProduct(ctx, service.id, productUpdateSchema.parse({ minimumStock: "2" })),
    ).rejects.toBeInstanceOf(ConstraintViolation);
  });

  it("lists active products under their minimum, lowest first", async () => {
    const { ctx } = createTestContext();
    await seedProduct(ctx, { name: "Bolts", currentStock: "2", minimumStock: "5" });
    await seedProduct(ctx, { name: "Nuts", currentStock: "0", minimumStock: "1" });
    await seedProduct(ctx, { name: "Screws", currentStock: "10", minimumStock: "5" });
    await seedProduct(ctx, { name: "Rivets", currentStock: "0", minimumStock: "3", isActive: false });
    await seedProduct(ctx, { name: "Consulting", productType: "service" });

    const low = await listLowStock(ctx);
    expect(low.map((product) => product.name)).toEqual(["Nuts", "Bolts"]);
  });

  it("summarizes the catalog and its inventory value", async () => {
    const { ctx } = createTestContext();
    await seedProduct(ctx, { name: "Widget", currentStock: "4", minimumStock: "5" });
    await seedProduct(ctx, { name: "Gadget", unitPrice: "10.00", currentStock: "2.5", isActive: false });
    await seedProduct(ctx, { name: "Consulting", unitPrice: "100.00", productType: "service" });

    expect(await productStats(ctx)).toEqual({
      total: 3,
      products: 2,
      services: 1,
      active: 2,
      inactive: 1,
      lowStock: 1,
      inventoryValue: "85.00",
    });
  });
});

describe("price with tax", () => {
  it("adds tax only to taxable products", () => {
    expect(priceWithTax({ unitPrice: "15.00", taxable: true }, "0.13")).toEqual({
      unitPrice: "15.00",
      taxRate: "0.13",
      tax: "1.95",
      priceWithTax: "16.95",
    });
    expect(priceWithTax({ unitPrice: "100.00", taxable: false }, "0.13")).toEqual({
      unitPrice: "100.00",
      taxRate: "0",
      tax: "0.00",
      priceWithTax: "100.00",
    });
  });

  it("uses the configured rate", async () => {
    const { ctx } = createTestContext({ taxRate: "0.2" });
    const product = await seedProduct(ctx, { unitPrice: "9.99" });
    expect(await getProductPrice(ctx, product.id)).toEqual({
      productId: product.id,
      unitPrice: "9.99",
      taxRate: "0.2",
      tax: "2.00",
      priceWithTax: "11.99",
    });
  });
});
