/**
 * Money helpers
 *
 * Totals are kept as plain numbers at two decimal places. Arithmetic goes
 * through Decimal so sums such as 1.99 × 4 land exactly on 7.96.
 */
import { Decimal } from "decimal.js";

export const MONEY_DECIMAL_PLACES = 2;

/**
 * Round to two decimal places, exact halves to the even neighbour
 */
export function roundMoney(value: number | Decimal): number {
  return new Decimal(value)
    .toDecimalPlaces(MONEY_DECIMAL_PLACES, Decimal.ROUND_HALF_EVEN)
    .toNumber();
}

/**
 * Add two amounts and round the result
 */
export function addMoney(a: number, b: number): number {
  return roundMoney(new Decimal(a).plus(b));
}
