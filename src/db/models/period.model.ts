import mongoose, { Schema, type InferSchemaType } from "mongoose";
import { periodStates, periodTypes } from "../../utils/constants.js";
import { revision, timestamped, uuidKey } from "./_shared.js";

const periodSchema = new Schema(
  {
    _id: uuidKey,
    startDate: { type: Date, required: true, index: true },
    endDate: { type: Date, required: true },
    periodType: { type: String, enum: periodTypes, required: true },
    state: { type: String, enum: periodStates, default: "open", index: true },
    revision,
  },
  { ...timestamped, collection: "periods" },
);

export type PeriodDoc = InferSchemaType<typeof periodSchema> & {
  _id: string;
  createdAt: Date;
  updatedAt: Date;
};

export const PeriodModel = mongoose.model("Period", periodSchema);
