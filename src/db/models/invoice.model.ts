import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { paymentTerms } from "../../utils/constants.js";
import { money, revision, timestamped, uuidKey } from "./_shared.js";

const invoiceSchema = new Schema(
  {
    _id: uuidKey,
    invoiceNumber: { type: String, required: true, unique: true },
    clientId: { type: String, ref: "Client", default: null, index: true },
    transactionId: { type: String, ref: "Transaction", default: null, index: true },
    // Derived from the lines; written only by the totals maintainer.
    subtotal: money(false),
    tax: money(false),
    grandTotal: money(false),
    discount: money(false),
    paymentTerms: { type: String, enum: paymentTerms, default: "cash" },
    salesperson: { type: String, default: null },
    issuedAt: { type: Date, required: true, index: true },
    dueAt: { type: Date, default: null },
    notes: { type: String, default: null },
    revision,
  },
  { ...timestamped, collection: "invoices" },
);

export type InvoiceDoc = InferSchemaType<typeof invoiceSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const InvoiceModel = mongoose.model("Invoice", invoiceSchema);
