/**
 * Checkout Types
 */

import type { Item, RuleAppliedEvent } from "@/modules/pricing/rule-engine";

/**
 * Outcome of a single scan
 */
export type ScanResult =
  | {
      status: "UNKNOWN_ITEM";
      itemId: string;
      total: number;
    }
  | {
      status: "SCANNED";
      item: Item;
      /** Set when the scan made a rule fire */
      appliedRule?: RuleAppliedEvent;
      total: number;
    };

/**
 * Totals for everything scanned so far
 */
export interface CheckoutSummary {
  scannedCount: number;
  unknownIds: string[];
  /** Running sum of intrinsic values */
  subtotal: number;
  /** Running sum of applied rule adjustments */
  adjustments: number;
  appliedRules: RuleAppliedEvent[];
  total: number;
}

export type RuleAppliedListener = (event: RuleAppliedEvent) => void;
