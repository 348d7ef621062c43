/**
 * Rule construction
 *
 * The adjustment is fixed here, once, and never recomputed.
 */

import { Decimal } from "decimal.js";

import { DefinitionError } from "@/lib/errors";
import { roundMoney } from "@/lib/money";

import { ItemMultiset } from "./multiset";
import { isProduct, type Item, type Rule } from "./types";

export function createRule(name: string, requiredItems: readonly Item[], targetAmount: number): Rule {
  if (requiredItems.length === 0) {
    throw new DefinitionError(`Rule ${name} requires at least one item`);
  }
  if (!Number.isFinite(targetAmount)) {
    throw new DefinitionError(`Rule ${name} has a non-finite target amount`);
  }

  return Object.freeze({
    name,
    requiredItems: Object.freeze([...requiredItems]),
    targetAmount,
    adjustment: calculateAdjustment(requiredItems, targetAmount),
  });
}

/**
 * target − Σ intrinsic value of the required products, to 2 places.
 * Coupons never reached the total, so they are left out of the prior sum.
 */
export function calculateAdjustment(requiredItems: readonly Item[], targetAmount: number): number {
  const priorSum = requiredItems
    .filter(isProduct)
    .reduce((sum, item) => sum.plus(item.intrinsicValue), new Decimal(0));

  return roundMoney(new Decimal(targetAmount).minus(priorSum));
}

/**
 * Required items as an id → count multiset
 */
export function requiredMultiset(rule: Rule): ItemMultiset {
  return ItemMultiset.from(rule.requiredItems.map((item) => item.id));
}

export function requiresItem(rule: Rule, itemId: string): boolean {
  return rule.requiredItems.some((item) => item.id === itemId);
}

/**
 * Multi-item rules consume their items; single-item rules leave the item
 * pending so it can fire again.
 */
export function consumesItems(rule: Rule): boolean {
  return rule.requiredItems.length > 1;
}
