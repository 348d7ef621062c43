/**
 * Pricing Rule Engine Types
 *
 * Defines the catalog model the rule engine works over:
 * - Products and coupons, unified as scheme items
 * - Bundle/coupon rules with a precomputed total adjustment
 * - Rule application events emitted by the checkout
 */

import { DefinitionError } from "@/lib/errors";

// ============================================================================
// ITEM TYPES
// ============================================================================

export type ItemKind = "PRODUCT" | "COUPON";

interface BaseItem {
  readonly kind: ItemKind;
  readonly id: string;
  /** Amount added to the total when the item is scanned */
  readonly intrinsicValue: number;
  /** Amount substituted for `{id}` in rule expressions */
  readonly nominalValue: number;
}

/**
 * A priced product. Intrinsic and nominal value are both the listed price.
 */
export interface Product extends BaseItem {
  readonly kind: "PRODUCT";
}

/**
 * A coupon. Never adds to the total on its own; nominal value is the
 * discount fraction (0-1).
 */
export interface Coupon extends BaseItem {
  readonly kind: "COUPON";
  readonly intrinsicValue: 0;
}

export type Item = Product | Coupon;

/**
 * Ids starting with this prefix are parsed as coupons
 */
export const COUPON_ID_PREFIX = "C";

export function isCoupon(item: Item): item is Coupon {
  return item.kind === "COUPON";
}

export function isProduct(item: Item): item is Product {
  return item.kind === "PRODUCT";
}

export function createProduct(id: string, price: number): Product {
  if (!Number.isFinite(price)) {
    throw new DefinitionError(`Product ${id} has a non-finite price`);
  }

  const product: Product = {
    kind: "PRODUCT",
    id,
    intrinsicValue: price,
    nominalValue: price,
  };
  return Object.freeze(product);
}

export function createCoupon(id: string, fraction: number): Coupon {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new DefinitionError(`Coupon ${id} must be a fraction between 0 and 1, got ${fraction}`);
  }

  const coupon: Coupon = {
    kind: "COUPON",
    id,
    intrinsicValue: 0,
    nominalValue: fraction,
  };
  return Object.freeze(coupon);
}

// ============================================================================
// RULE TYPES
// ============================================================================

/**
 * A bundle or coupon rule
 */
export interface Rule {
  readonly name: string;
  /** Required items in declaration order; repeats require several units */
  readonly requiredItems: readonly Item[];
  /** Price the required items should come to once the rule fires */
  readonly targetAmount: number;
  /** Signed delta applied to the total: target minus the prior sum */
  readonly adjustment: number;
}

// ============================================================================
// CHECKOUT OUTPUT
// ============================================================================

/**
 * Emitted every time a rule fires during a scan
 */
export interface RuleAppliedEvent {
  ruleName: string;
  adjustment: number;
  consumedItemIds: string[];
  totalAfter: number;
}
