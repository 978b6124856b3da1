import { describe, it, expect } from "vitest";
import { splitByShares } from "../../src/engine/index.js";

describe("splitByShares", () => {
  it("should split by whole share counts", () => {
    const result = splitByShares(1000, ["a", "b"], { a: 1, b: 2 });

    expect(result).toEqual([
      { participantId: "a", amount: 333, rawInput: 1 },
      { participantId: "b", amount: 667, rawInput: 2 },
    ]);
  });

  it("should give nothing to a participant with zero shares", () => {
    const result = splitByShares(900, ["a", "b", "c"], { a: 2, b: 1, c: 0 });
    expect(result.map((split) => split.amount)).toEqual([600, 300, 0]);
  });

  it("should throw when every share count is zero", () => {
    expect(() => splitByShares(1000, ["a", "b"], { a: 0, b: 0 })).toThrow(
      "Enter shares for at least one person"
    );
  });

  it("should reject fractional shares", () => {
    expect(() => splitByShares(1000, ["a", "b"], { a: 1.5, b: 1 })).toThrow(
      "Shares for a must be a whole, non-negative number"
    );
  });
});
