/**
 * Derived fields of one invoice line.
 *
 * Pure and deterministic: the same inputs always give the same aggregate,
 * so it is re-run on every line update, not only on creation.
 */

import type { LineAggregate } from "../../../store/types.js";
import { ConstraintViolation } from "../../../utils/errors.js";
import {
  fromScaled,
  MONEY_SCALE,
  multiplyScaled,
  percentOf,
  RATE_SCALE,
  toScaled,
} from "../../../utils/money.js";

export interface LineInput {
  quantity: string;
  unitPrice: string;
  discountPercentage?: string | null;
  discountAmount?: string | null;
  /** Tax flag of the referenced product. */
  taxable: boolean;
}

export interface ComputedLine extends LineAggregate {
  quantity: string;
  unitPrice: string;
  discountPercentage: string;
}

/**
 * 1. raw = quantity × unitPrice
 * 2. a positive discountPercentage overrides discountAmount: raw × pct / 100
 * 3. lineSubtotal = raw − discountAmount, never negative
 * 4. lineTax = lineSubtotal × taxRate when taxable, else 0
 * 5. lineTotal = lineSubtotal + lineTax
 *
 * Every product is rounded half away from zero to two places.
 */
export function computeLine(input: LineInput, taxRate: string): ComputedLine {
  const quantity = toScaled(input.quantity);
  const unitPrice = toScaled(input.unitPrice);
  const percentage = toScaled(input.discountPercentage ?? "0");
  const suppliedDiscount = toScaled(input.discountAmount ?? "0");
  const rate = toScaled(taxRate, RATE_SCALE);

  if (quantity <= 0n) {
    throw new ConstraintViolation("Quantity must be greater than zero", { quantity: input.quantity });
  }
  if (unitPrice < 0n) {
    throw new ConstraintViolation("Unit price must not be negative", { unitPrice: input.unitPrice });
  }
  if (percentage < 0n || percentage > toScaled("100")) {
    throw new ConstraintViolation("Discount percentage must be between 0 and 100", {
      discountPercentage: input.discountPercentage,
    });
  }
  if (suppliedDiscount < 0n) {
    throw new ConstraintViolation("Discount amount must not be negative", {
      discountAmount: input.discountAmount,
    });
  }

  const raw = multiplyScaled(quantity, MONEY_SCALE, unitPrice, MONEY_SCALE);
  const discountAmount = percentage > 0n ? percentOf(raw, percentage) : suppliedDiscount;

  const lineSubtotal = raw - discountAmount;
  if (lineSubtotal < 0n) {
    throw new ConstraintViolation("Line discount exceeds the line amount", {
      amount: fromScaled(raw),
      discountAmount: fromScaled(discountAmount),
    });
  }

  const lineTax = input.taxable ? multiplyScaled(lineSubtotal, MONEY_SCALE, rate, RATE_SCALE) : 0n;

  return {
    quantity: fromScaled(quantity),
    unitPrice: fromScaled(unitPrice),
    discountPercentage: fromScaled(percentage),
    discountAmount: fromScaled(discountAmount),
    lineSubtotal: fromScaled(lineSubtotal),
    lineTax: fromScaled(lineTax),
    lineTotal: fromScaled(lineSubtotal + lineTax),
  };
}
