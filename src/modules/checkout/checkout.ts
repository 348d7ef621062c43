/**
 * Checkout
 *
 * One scanning session over a scheme. Each scan adds the item's intrinsic
 * value to the total, tracks items that take part in a rule as pending, and
 * applies the best matching rule. The total is rounded to 2 places after
 * every change.
 */

import { describeError } from "@/lib/errors";
import { createLogger, type Logger } from "@/lib/logger";
import { addMoney } from "@/lib/money";
import { consumesItems, type Item, type Rule, type RuleAppliedEvent } from "@/modules/pricing/rule-engine";
import type { Scheme } from "@/modules/pricing/scheme";

import type { CheckoutSummary, RuleAppliedListener, ScanResult } from "./types";

export interface CheckoutOptions {
  /** Called after every rule application */
  onRuleApplied?: RuleAppliedListener;
  logger?: Logger;
}

export class Checkout {
  private readonly pendingItems: Item[] = [];
  private readonly appliedRules: RuleAppliedEvent[] = [];
  private readonly unknownIds: string[] = [];
  private readonly onRuleApplied?: RuleAppliedListener;
  private readonly logger: Logger;
  private scannedCount = 0;
  private subtotal = 0;
  private adjustments = 0;
  private total = 0;

  constructor(
    private readonly scheme: Scheme,
    options: CheckoutOptions = {}
  ) {
    this.onRuleApplied = options.onRuleApplied;
    this.logger = options.logger ?? createLogger("checkout");
  }

  /**
   * Scan an item by id. Unknown ids are reported and leave the session
   * untouched.
   */
  scan(rawId: string): ScanResult {
    const itemId = rawId.trim();
    const item = this.scheme.getItem(itemId);

    if (!item) {
      this.unknownIds.push(itemId);
      this.logger.warn("Unknown item scanned", { itemId });
      return { status: "UNKNOWN_ITEM", itemId, total: this.total };
    }

    this.scannedCount += 1;
    this.subtotal = addMoney(this.subtotal, item.intrinsicValue);
    this.total = addMoney(this.total, item.intrinsicValue);
    this.logger.debug("Item scanned", {
      itemId,
      kind: item.kind,
      intrinsicValue: item.intrinsicValue,
      total: this.total,
    });

    // Items outside every rule can never trigger one
    if (!this.scheme.existsInRule(item)) {
      return { status: "SCANNED", item, total: this.total };
    }

    this.pendingItems.push(item);
    const rule = this.scheme.getRule(this.pendingItems);
    if (!rule) {
      return { status: "SCANNED", item, total: this.total };
    }

    const appliedRule = this.applyRule(rule);
    return { status: "SCANNED", item, appliedRule, total: this.total };
  }

  getTotal(): number {
    return this.total;
  }

  /**
   * Pending items in scan order
   */
  getPendingItems(): Item[] {
    return [...this.pendingItems];
  }

  /**
   * Every rule application so far, in order
   */
  getAppliedRules(): RuleAppliedEvent[] {
    return [...this.appliedRules];
  }

  getSummary(): CheckoutSummary {
    return {
      scannedCount: this.scannedCount,
      unknownIds: [...this.unknownIds],
      subtotal: this.subtotal,
      adjustments: this.adjustments,
      appliedRules: this.getAppliedRules(),
      total: this.total,
    };
  }

  private applyRule(rule: Rule): RuleAppliedEvent {
    const consumedItemIds: string[] = [];

    if (consumesItems(rule)) {
      for (const required of rule.requiredItems) {
        const index = this.pendingItems.findIndex((item) => item.id === required.id);
        if (index !== -1) {
          this.pendingItems.splice(index, 1);
          consumedItemIds.push(required.id);
        }
      }
    }

    this.adjustments = addMoney(this.adjustments, rule.adjustment);
    this.total = addMoney(this.total, rule.adjustment);

    const event: RuleAppliedEvent = {
      ruleName: rule.name,
      adjustment: rule.adjustment,
      consumedItemIds,
      totalAfter: this.total,
    };
    this.appliedRules.push(event);
    this.logger.info("Rule applied", { ...event });
    this.notify(event);

    return event;
  }

  private notify(event: RuleAppliedEvent): void {
    if (!this.onRuleApplied) {
      return;
    }

    try {
      this.onRuleApplied(event);
    } catch (error) {
      this.logger.error("Rule listener failed", {
        ruleName: event.ruleName,
        error: describeError(error),
      });
    }
  }
}
