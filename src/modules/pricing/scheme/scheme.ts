/**
 * Scheme
 *
 * The immutable item and rule catalog for a checkout session. Safe to share
 * between sessions.
 */

import { DefinitionError } from "@/lib/errors";

import { ruleMatcher } from "../rule-engine/rule-matcher";
import type { Item, Rule } from "../rule-engine/types";

export class Scheme {
  private readonly itemIndex: ReadonlyMap<string, Item>;
  private readonly ruleIndex: ReadonlyMap<string, Rule>;
  private readonly ruleItemIds: ReadonlySet<string>;
  readonly items: readonly Item[];
  readonly rules: readonly Rule[];

  constructor(items: readonly Item[], rules: readonly Rule[]) {
    const itemIndex = new Map<string, Item>();
    for (const item of items) {
      if (itemIndex.has(item.id)) {
        throw new DefinitionError(`Duplicate item id: ${item.id}`);
      }
      itemIndex.set(item.id, item);
    }

    const ruleIndex = new Map<string, Rule>();
    const ruleItemIds = new Set<string>();
    for (const rule of rules) {
      if (ruleIndex.has(rule.name)) {
        throw new DefinitionError(`Duplicate rule name: ${rule.name}`);
      }
      for (const item of rule.requiredItems) {
        if (itemIndex.get(item.id) !== item) {
          throw new DefinitionError(`Rule ${rule.name} references item ${item.id} outside the scheme`);
        }
        ruleItemIds.add(item.id);
      }
      ruleIndex.set(rule.name, rule);
    }

    this.itemIndex = itemIndex;
    this.ruleIndex = ruleIndex;
    this.ruleItemIds = ruleItemIds;
    this.items = Object.freeze([...items]);
    this.rules = Object.freeze([...rules]);
  }

  /**
   * Look up an item by id; undefined for unknown barcodes
   */
  getItem(id: string): Item | undefined {
    return this.itemIndex.get(id);
  }

  getRuleByName(name: string): Rule | undefined {
    return this.ruleIndex.get(name);
  }

  /**
   * True when the item appears in at least one rule
   */
  existsInRule(item: Item | string): boolean {
    return this.ruleItemIds.has(typeof item === "string" ? item : item.id);
  }

  /**
   * Find the rule that fires for the pending items, if any
   */
  getRule(pendingItems: readonly Item[]): Rule | undefined {
    return ruleMatcher.findBestRule(this.rules, pendingItems);
  }
}
