import { describe, expect, it } from "vitest";

import { addMoney, roundMoney } from "./money";

describe("money", () => {
  describe("roundMoney", () => {
    it("rounds exact halves to the even neighbour", () => {
      expect(roundMoney(1.005)).toBe(1);
      expect(roundMoney(1.015)).toBe(1.02);
      expect(roundMoney(-0.125)).toBe(-0.12);
      expect(roundMoney(-0.135)).toBe(-0.14);
    });

    it("keeps values already at two places", () => {
      expect(roundMoney(7.96)).toBe(7.96);
    });

    it("rounds down below the midpoint", () => {
      expect(roundMoney(-2.3235)).toBe(-2.32);
    });
  });

  describe("addMoney", () => {
    it("adds without binary float drift", () => {
      expect(addMoney(0.1, 0.2)).toBe(0.3);
    });

    it("accumulates four toothbrushes to exactly 7.96", () => {
      let total = 0;
      for (let i = 0; i < 4; i++) {
        total = addMoney(total, 1.99);
      }
      expect(total).toBe(7.96);
    });
  });
});
