import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { transactionDirections } from "../../utils/constants.js";
import { revision, timestamped, uuidKey } from "./_shared.js";

const transactionSchema = new Schema(
  {
    _id: uuidKey,
    occurredAt: { type: Date, required: true, index: true },
    description: { type: String, required: true, maxlength: 500 },
    direction: { type: String, enum: transactionDirections, required: true },
    currency: { type: String, default: "USD", minlength: 3, maxlength: 3 },
    createdBy: { type: String, required: true },
    periodId: { type: String, ref: "Period", default: null, index: true },
    category: { type: String, default: null },
    revision,
  },
  { ...timestamped, collection: "transactions" },
);
transactionSchema.index({ periodId: 1, occurredAt: -1 });

export type TransactionDoc = InferSchemaType<typeof transactionSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const TransactionModel = mongoose.model("Transaction", transactionSchema);
