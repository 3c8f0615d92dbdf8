import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { productTypes } from "../../utils/constants.js";
import { money, revision, timestamped, uuidKey } from "./_shared.js";

const productSchema = new Schema(
  {
    _id: uuidKey,
    code: { type: String, default: null },
    name: { type: String, required: true, maxlength: 200 },
    description: { type: String, default: null },
    productType: { type: String, enum: productTypes, default: "product" },
    category: { type: String, default: null },
    unitPrice: money(),
    unitOfMeasure: { type: String, default: "unit" },
    currentStock: money(false),
    minimumStock: money(false),
    taxable: { type: Boolean, default: true },
    isActive: { type: Boolean, default: true, index: true },
    revision,
  },
  { ...timestamped, collection: "products" },
);
productSchema.index({ code: 1 }, { unique: true, partialFilterExpression: { code: { $type: "string" } } });

export type ProductDoc = InferSchemaType<typeof productSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const ProductModel = mongoose.model("Product", productSchema);
