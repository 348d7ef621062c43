import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

import { SchemeFileError } from "@/lib/errors";
import { loadScheme } from "@/modules/pricing/scheme";

import { Checkout } from "./checkout";
import {
  DEFAULT_SCAN_SEQUENCE,
  formatScanResult,
  formatSummary,
  readScanFile,
  runScans,
} from "./scan-runner";
import type { ScanResult } from "./types";

const inputPath = (name: string) => fileURLToPath(new URL(`../../../input/${name}`, import.meta.url));

const createCheckout = async () => {
  const { scheme } = await loadScheme(inputPath("scheme.txt"));
  return new Checkout(scheme);
};

describe("runScans", () => {
  it("prices the default basket against the sample scheme", async () => {
    const checkout = await createCheckout();

    const summary = runScans(checkout, DEFAULT_SCAN_SEQUENCE);

    expect(summary.scannedCount).toBe(8);
    expect(summary.subtotal).toBe(31.92);
    expect(summary.adjustments).toBe(-2.98);
    expect(summary.total).toBe(28.94);
    expect(summary.appliedRules.map((event) => [event.ruleName, event.totalAfter])).toEqual([
      ["Chips and Salsa", 9.47],
      ["Toothbrush 3 for 2", 26.95],
    ]);
    expect(checkout.getPendingItems().map((item) => item.id)).toEqual(["0923", "1983"]);
  });

  it("reports every result in order and skips blank ids", async () => {
    const checkout = await createCheckout();
    const results: ScanResult[] = [];

    runScans(checkout, ["1983", "", "  ", "0000"], {
      onResult: (result) => results.push(result),
    });

    expect(results.map((result) => result.status)).toEqual(["SCANNED", "UNKNOWN_ITEM"]);
  });

  it("applies the wine coupon from the sample scan file", async () => {
    const checkout = await createCheckout();
    const ids = await readScanFile(inputPath("scans.txt"));

    const summary = runScans(checkout, ids);

    expect(ids).toHaveLength(9);
    expect(ids[8]).toBe("C15");
    expect(summary.appliedRules.at(-1)).toEqual({
      ruleName: "Wine Coupon",
      adjustment: -2.32,
      consumedItemIds: ["0923", "C15"],
      totalAfter: 26.62,
    });
    expect(summary.total).toBe(26.62);
  });
});

describe("readScanFile", () => {
  it("fails on a missing file", async () => {
    await expect(readScanFile("does/not/exist.txt")).rejects.toBeInstanceOf(SchemeFileError);
  });
});

describe("formatting", () => {
  it("formats a scan that applies a rule", async () => {
    const checkout = await createCheckout();
    checkout.scan("4900");

    expect(formatScanResult(checkout.scan("6732"))).toEqual([
      "Scanning 6732",
      "  Price 2.49",
      "  Adjustment Chips and Salsa applied: -0.99",
    ]);
  });

  it("formats coupons and unknown items", async () => {
    const checkout = await createCheckout();

    expect(formatScanResult(checkout.scan("C15"))).toEqual(["Scanning C15", "  Coupon 15%"]);
    expect(formatScanResult(checkout.scan("0000"))).toEqual([
      "Scanning 0000",
      "  Unknown item 0000, skipped",
    ]);
  });

  it("formats the summary", async () => {
    const checkout = await createCheckout();

    expect(formatSummary(runScans(checkout, DEFAULT_SCAN_SEQUENCE))).toEqual([
      "Subtotal: 31.92",
      "Adjustments: -2.98",
      "Total: 28.94",
    ]);
  });
});
