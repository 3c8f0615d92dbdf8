import mongoose from "mongoose";
import { normalizeAmount, ZERO_AMOUNT } from "./money.js";

export function toDecimal(value: string | mongoose.Types.Decimal128) {
  if (value instanceof mongoose.Types.Decimal128) return value;
  return mongoose.Types.Decimal128.fromString(normalizeAmount(value));
}

/** Two-place string for a stored Decimal128; missing values read as zero. */
export function decimalToString(value: mongoose.Types.Decimal128 | null | undefined): string {
  if (!value) return ZERO_AMOUNT;
  return normalizeAmount(value.toString());
}
