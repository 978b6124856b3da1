import { describe, it, expect } from "vitest";
import {
  computeSplits,
  rescalePayers,
  rescaleSplits,
  InvalidSplitInputError,
} from "../../src/engine/index.js";
import type { SplitMethod } from "../../src/types/index.js";

const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);

describe("computeSplits", () => {
  it("should dispatch on the split method", () => {
    expect(computeSplits(1000, "equal", ["a", "b"]).splits.map((s) => s.amount)).toEqual([500, 500]);
    expect(
      computeSplits(1000, "shares", ["a", "b"], { a: 3, b: 1 }).splits.map((s) => s.amount)
    ).toEqual([750, 250]);
  });

  it("should always sum to the total", () => {
    const cases: Array<[SplitMethod, Record<string, number>]> = [
      ["equal", {}],
      ["amount", { a: 100, b: 200, c: 9701 }],
      ["percentage", { a: 10, b: 45.5, c: 44.5 }],
      ["shares", { a: 1, b: 1, c: 5 }],
      ["adjustment", { a: 250, c: -40 }],
    ];

    for (const [method, inputs] of cases) {
      const { splits } = computeSplits(10001, method, ["a", "b", "c"], inputs);
      expect(sum(splits.map((split) => split.amount))).toBe(10001);
    }
  });

  it("should reject a negative or fractional total", () => {
    expect(() => computeSplits(-1, "equal", ["a"])).toThrow(InvalidSplitInputError);
    expect(() => computeSplits(10.5, "equal", ["a"])).toThrow(
      "Total amount must be a whole, non-negative number of minor units"
    );
  });

  it("should reject an empty participant set", () => {
    expect(() => computeSplits(1000, "equal", [])).toThrow(
      "Select at least one person to split with"
    );
  });
});

describe("rescaleSplits", () => {
  it("should keep each participant's proportion", () => {
    const splits = [
      { participantId: "a", amount: 3334, rawInput: 0 },
      { participantId: "b", amount: 3333, rawInput: 0 },
      { participantId: "c", amount: 3333, rawInput: 0 },
    ];

    expect(rescaleSplits(splits, 5000, "equal").map((s) => s.amount)).toEqual([1667, 1667, 1666]);
  });

  it("should update exact-amount inputs to the new amounts", () => {
    const splits = [
      { participantId: "a", amount: 600, rawInput: 600 },
      { participantId: "b", amount: 400, rawInput: 400 },
    ];

    expect(rescaleSplits(splits, 500, "amount")).toEqual([
      { participantId: "a", amount: 300, rawInput: 300 },
      { participantId: "b", amount: 200, rawInput: 200 },
    ]);
  });
});

describe("rescalePayers", () => {
  it("should give a sole payer the full new total", () => {
    expect(rescalePayers([{ participantId: "a", amount: 1000 }], 1234)).toEqual([
      { participantId: "a", amount: 1234 },
    ]);
  });

  it("should rescale several payers proportionally", () => {
    const payers = [
      { participantId: "a", amount: 600 },
      { participantId: "b", amount: 400 },
    ];

    expect(rescalePayers(payers, 500)).toEqual([
      { participantId: "a", amount: 300 },
      { participantId: "b", amount: 200 },
    ]);
  });
});
