import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { money, timestamped, uuidKey } from "./_shared.js";

const invoiceLineSchema = new Schema(
  {
    _id: uuidKey,
    invoiceId: { type: String, ref: "Invoice", required: true, index: true },
    productId: { type: String, ref: "Product", required: true, index: true },
    description: { type: String, default: null },
    quantity: money(),
    unitPrice: money(),
    discountPercentage: money(false),
    discountAmount: money(false),
    lineSubtotal: money(false),
    lineTax: money(false),
    lineTotal: money(false),
  },
  { ...timestamped, collection: "invoiceLines" },
);
invoiceLineSchema.index({ invoiceId: 1, createdAt: 1 });

export type InvoiceLineDoc = InferSchemaType<typeof invoiceLineSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const InvoiceLineModel = mongoose.model("InvoiceLine", invoiceLineSchema);
