import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { accountClassifications } from "../../utils/constants.js";
import { revision, timestamped, uuidKey } from "./_shared.js";

const accountSchema = new Schema(
  {
    _id: uuidKey,
    code: { type: String, required: true, unique: true, maxlength: 20 },
    name: { type: String, required: true, maxlength: 100 },
    classification: { type: String, enum: accountClassifications, required: true, index: true },
    revision,
  },
  { ...timestamped, collection: "accounts" },
);

export type AccountDoc = InferSchemaType<typeof accountSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const AccountModel = mongoose.model("Account", accountSchema);
