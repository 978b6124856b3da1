import { describe, it, expect } from "vitest";
import { splitByAdjustment } from "../../src/engine/index.js";

const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);

describe("splitByAdjustment", () => {
  it("should take a positive adjustment from the unadjusted participants", () => {
    const { splits, warnings } = splitByAdjustment(10000, ["a", "b", "c"], { a: 1000 });

    expect(splits).toEqual([
      { participantId: "a", amount: 4334, rawInput: 1000 },
      { participantId: "b", amount: 2833, rawInput: 0 },
      { participantId: "c", amount: 2833, rawInput: 0 },
    ]);
    expect(warnings).toEqual([]);
  });

  it("should clamp a share pushed below zero and report it", () => {
    const { splits, warnings } = splitByAdjustment(1000, ["a", "b", "c"], { a: -600 });

    expect(splits.map((split) => split.amount)).toEqual([0, 500, 500]);
    expect(warnings).toEqual([
      {
        code: "ADJUSTMENT_CLAMPED",
        participantId: "a",
        requestedAmount: -266,
        appliedAmount: 0,
      },
    ]);
  });

  it("should spread the residual over everyone when all are adjusted", () => {
    const { splits } = splitByAdjustment(900, ["a", "b", "c"], { a: 100, b: -100, c: 50 });

    expect(splits.map((split) => split.amount)).toEqual([384, 183, 333]);
    expect(sum(splits.map((split) => split.amount))).toBe(900);
  });

  it("should reject adjustments larger than the total", () => {
    expect(() => splitByAdjustment(1000, ["a", "b"], { a: 800, b: 300 })).toThrow(
      "Adjustments cannot exceed the total amount"
    );
  });

  it("should reject fractional adjustments", () => {
    expect(() => splitByAdjustment(1000, ["a", "b"], { a: 0.5 })).toThrow(
      "Adjustment for a must be a whole number of minor units"
    );
  });
});
