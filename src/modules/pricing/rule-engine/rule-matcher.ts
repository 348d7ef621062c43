/**
 * Rule Matcher
 *
 * Finds the rule that fires for the current pending items.
 * A rule is eligible when it requires the most recently pending item and its
 * required items form a sub-multiset of the pending items. Among eligible
 * rules the one leaving the fewest pending units behind wins; ties go to the
 * rule declared first.
 */

import { createLogger } from "@/lib/logger";

import { ItemMultiset } from "./multiset";
import { requiredMultiset, requiresItem } from "./rule";
import type { Item, Rule } from "./types";

const logger = createLogger("rule-matcher");

/**
 * An eligible rule and the pending units it would leave unconsumed
 */
export interface RuleCandidate {
  rule: Rule;
  declarationIndex: number;
  leftover: number;
}

export class RuleMatcher {
  private readonly requiredCache = new WeakMap<Rule, ItemMultiset>();

  /**
   * Pick the winning rule, or undefined when nothing applies
   */
  findBestRule(rules: readonly Rule[], pendingItems: readonly Item[]): Rule | undefined {
    const candidates = this.findCandidates(rules, pendingItems);

    if (candidates.length > 0) {
      logger.debug("Rules eligible", {
        triggerItemId: pendingItems.at(-1)?.id,
        candidates: candidates.map(({ rule, leftover }) => ({ rule: rule.name, leftover })),
      });
    }

    return candidates[0]?.rule;
  }

  /**
   * All eligible rules, best first
   */
  findCandidates(rules: readonly Rule[], pendingItems: readonly Item[]): RuleCandidate[] {
    const triggerItemId = pendingItems.at(-1)?.id;
    if (triggerItemId === undefined) {
      return [];
    }

    const pending = ItemMultiset.from(pendingItems.map((item) => item.id));
    const candidates: RuleCandidate[] = [];

    rules.forEach((rule, declarationIndex) => {
      if (!requiresItem(rule, triggerItemId)) {
        return;
      }

      const required = this.getRequired(rule);
      if (!required.isSubMultisetOf(pending)) {
        return;
      }

      candidates.push({
        rule,
        declarationIndex,
        leftover: pending.differenceSum(required),
      });
    });

    return candidates.sort(
      (a, b) => a.leftover - b.leftover || a.declarationIndex - b.declarationIndex
    );
  }

  private getRequired(rule: Rule): ItemMultiset {
    let required = this.requiredCache.get(rule);
    if (!required) {
      required = requiredMultiset(rule);
      this.requiredCache.set(rule, required);
    }
    return required;
  }
}

// Export singleton instance
export const ruleMatcher = new RuleMatcher();
