import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { money, timestamped, uuidKey } from "./_shared.js";

const ledgerEntrySchema = new Schema(
  {
    _id: uuidKey,
    transactionId: { type: String, ref: "Transaction", required: true, index: true },
    accountId: { type: String, ref: "Account", required: true, index: true },
    debit: money(false),
    credit: money(false),
  },
  { ...timestamped, collection: "ledgerEntries" },
);
ledgerEntrySchema.index({ transactionId: 1, createdAt: 1 });

export type LedgerEntryDoc = InferSchemaType<typeof ledgerEntrySchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const LedgerEntryModel = mongoose.model("LedgerEntry", ledgerEntrySchema);
