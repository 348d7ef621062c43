import { describe, expect, it } from "vitest";

import { DefinitionError, UnknownItemError } from "@/lib/errors";

import { buildScheme, SchemeBuilder } from "./scheme-builder";

describe("buildScheme", () => {
  it("builds items and rules in declaration order", () => {
    const { scheme, diagnostics } = buildScheme(
      ["{6732}->1.00", "{4900}->2.00", "{Bundle}->{6732}{4900}=2.50"].join("\n")
    );

    expect(diagnostics).toEqual([]);
    expect(scheme.items.map((item) => item.id)).toEqual(["6732", "4900"]);
    expect(scheme.rules.map((rule) => rule.name)).toEqual(["Bundle"]);
    expect(scheme.getRuleByName("Bundle")?.adjustment).toBe(-0.5);
  });

  it("treats ids starting with C as coupons", () => {
    const { scheme } = buildScheme("{C1}->0.25\n{1983}->1.99");

    expect(scheme.getItem("C1")).toEqual({
      kind: "COUPON",
      id: "C1",
      intrinsicValue: 0,
      nominalValue: 0.25,
    });
    expect(scheme.getItem("1983")?.kind).toBe("PRODUCT");
  });

  it("substitutes nominal values into expressions", () => {
    const { scheme } = buildScheme(
      [
        "{8873}->2.49",
        "{C1}->0.5",
        "{Half}->{8873}/2",
        "{Half Milk}->{8873}{C1}={8873}*(1-{C1})",
      ].join("\n")
    );

    expect(scheme.getItem("Half")?.intrinsicValue).toBe(1.245);
    const rule = scheme.getRuleByName("Half Milk");
    expect(rule?.targetAmount).toBe(1.245);
    expect(rule?.adjustment).toBe(-1.24);
  });

  it("skips failing lines with one diagnostic each", () => {
    const source = [
      "{6732}->1.00",
      "{4900}->2.00",
      "bogus line",
      "{Bundle}->{6732}{4900}=2.50",
      "{Ghost}->{9999}=1.00",
      "{Bad}->{6732}=1+",
      "{Empty}->=1.00",
      "{6732}->5.00",
      "{C9}->1.5",
      "{Bundle}->{6732}=0.5",
    ].join("\n");

    const { scheme, diagnostics } = buildScheme(source);

    expect(diagnostics.map((d) => [d.line, d.code])).toEqual([
      [3, "MALFORMED_ENTRY"],
      [5, "UNKNOWN_ITEM"],
      [6, "MALFORMED_ENTRY"],
      [7, "DEFINITION_ERROR"],
      [8, "DEFINITION_ERROR"],
      [9, "DEFINITION_ERROR"],
      [10, "DEFINITION_ERROR"],
    ]);
    expect(diagnostics[1]).toEqual({
      line: 5,
      code: "UNKNOWN_ITEM",
      message: "Unknown item: 9999",
      text: "{Ghost}->{9999}=1.00",
    });

    // the first definitions survive
    expect(scheme.items.map((item) => item.id)).toEqual(["6732", "4900"]);
    expect(scheme.getItem("6732")?.intrinsicValue).toBe(1);
    expect(scheme.rules.map((rule) => rule.name)).toEqual(["Bundle"]);
    expect(scheme.getRuleByName("Bundle")?.requiredItems).toHaveLength(2);
  });

  it("requires items to precede the rules that use them", () => {
    const { scheme, diagnostics } = buildScheme("{Early}->{1983}=1.49\n{1983}->1.99");

    expect(diagnostics).toMatchObject([{ line: 1, code: "UNKNOWN_ITEM" }]);
    expect(scheme.rules).toEqual([]);
    expect(scheme.existsInRule("1983")).toBe(false);
  });

  it("reports unknown references inside amount expressions", () => {
    const { diagnostics } = buildScheme("{1983}->1.99\n{Odd}->{1983}={4900}-1");

    expect(diagnostics).toMatchObject([{ line: 2, code: "UNKNOWN_ITEM", message: "Unknown item: 4900" }]);
  });
});

describe("SchemeBuilder", () => {
  it("throws on duplicate definitions", () => {
    const builder = new SchemeBuilder();
    builder.addItem("1983", "1.99");
    builder.addRule("Loyalty", ["1983"], "1.49");

    expect(() => builder.addItem("1983", "2.00")).toThrow(DefinitionError);
    expect(() => builder.addRule("Loyalty", ["1983"], "1.00")).toThrow(DefinitionError);
  });

  it("throws on unknown rule items", () => {
    const builder = new SchemeBuilder();

    expect(() => builder.addRule("Ghost", ["0000"], "1")).toThrow(UnknownItemError);
  });
});
