/**
 * Key of the only method that may write invoice aggregates.
 *
 * Imported by the invoice total maintainer and the store drivers, nowhere
 * else, so header totals cannot be set through the ordinary update path.
 */
export const writeTotals: unique symbol = Symbol("invoice.writeTotals");
