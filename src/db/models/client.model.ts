import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { clientTypes } from "../../utils/constants.js";
import { revision, timestamped, uuidKey } from "./_shared.js";

const clientSchema = new Schema(
  {
    _id: uuidKey,
    name: { type: String, required: true, maxlength: 200 },
    // Unique only when present.
    taxId: { type: String, default: null },
    address: { type: String, default: null },
    phone: { type: String, default: null },
    email: { type: String, default: null },
    clientType: { type: String, enum: clientTypes, default: "individual" },
    notes: { type: String, default: null },
    isActive: { type: Boolean, default: true, index: true },
    revision,
  },
  { ...timestamped, collection: "clients" },
);
clientSchema.index({ taxId: 1 }, { unique: true, partialFilterExpression: { taxId: { $type: "string" } } });

export type ClientDoc = InferSchemaType<typeof clientSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const ClientModel = mongoose.model("Client", clientSchema);
