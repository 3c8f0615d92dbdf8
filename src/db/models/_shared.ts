import { randomUUID } from "node:crypto";
import { Schema } from "mongoose";

export const timestamped = { timestamps: true } as const;

/** String primary keys, so ids look the same on every store driver. */
export const uuidKey = { type: String, default: () => randomUUID() };

export const money = (required = true) => ({
  type: Schema.Types.Decimal128,
  required,
  default: required ? undefined : "0.00",
});

export const revision = { type: Number, default: 0, min: 0 };
