/**
 * Scan Runner
 *
 * Feeds a sequence of scanned ids through a checkout and formats the
 * resulting receipt lines.
 */

import { readFile } from "node:fs/promises";

import { describeError, SchemeFileError } from "@/lib/errors";

import type { Checkout } from "./checkout";
import type { CheckoutSummary, ScanResult } from "./types";

/**
 * Demonstration basket used when no scan file is given
 */
export const DEFAULT_SCAN_SEQUENCE = [
  "1983", // toothbrush
  "4900", // salsa
  "8873", // milk
  "6732", // chips
  "0923", // wine
  "1983",
  "1983",
  "1983",
] as const;

export interface RunScansOptions {
  /** Called with each scan outcome, in order */
  onResult?: (result: ScanResult) => void;
}

/**
 * Scan every non-blank id in order and return the summary
 */
export function runScans(
  checkout: Checkout,
  ids: Iterable<string>,
  options: RunScansOptions = {}
): CheckoutSummary {
  for (const id of ids) {
    if (id.trim() === "") {
      continue;
    }
    const result = checkout.scan(id);
    options.onResult?.(result);
  }

  return checkout.getSummary();
}

/**
 * Read one scanned id per line
 */
export async function readScanFile(path: string): Promise<string[]> {
  let contents: string;
  try {
    contents = await readFile(path, "utf-8");
  } catch (error) {
    throw new SchemeFileError(`Cannot read scan file ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

export function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

function formatSigned(amount: number): string {
  return amount < 0 ? `-${formatAmount(-amount)}` : `+${formatAmount(amount)}`;
}

/**
 * Receipt lines for one scan
 */
export function formatScanResult(result: ScanResult): string[] {
  if (result.status === "UNKNOWN_ITEM") {
    return [`Scanning ${result.itemId}`, `  Unknown item ${result.itemId}, skipped`];
  }

  const { item, appliedRule } = result;
  const lines = [
    `Scanning ${item.id}`,
    item.kind === "COUPON"
      ? `  Coupon ${Math.round(item.nominalValue * 100)}%`
      : `  Price ${formatAmount(item.intrinsicValue)}`,
  ];

  if (appliedRule) {
    lines.push(`  Adjustment ${appliedRule.ruleName} applied: ${formatSigned(appliedRule.adjustment)}`);
  }

  return lines;
}

export function formatSummary(summary: CheckoutSummary): string[] {
  return [
    `Subtotal: ${formatAmount(summary.subtotal)}`,
    `Adjustments: ${formatSigned(summary.adjustments)}`,
    `Total: ${formatAmount(summary.total)}`,
  ];
}
