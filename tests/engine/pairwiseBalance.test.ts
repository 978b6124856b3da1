import { describe, it, expect } from "vitest";
import {
  pairwiseBalance,
  netPositions,
  InvalidParticipantPairError,
} from "../../src/engine/index.js";
import { makeTransaction } from "../helpers/fixtures.js";

describe("pairwiseBalance", () => {
  const dinner = makeTransaction({
    payers: { alice: 3000 },
    splits: { alice: 1000, bob: 1000, charlie: 1000 },
  });

  it("should make each debtor owe the single payer their share", () => {
    expect(pairwiseBalance(dinner, "alice", "bob")).toBe(1000);
    expect(pairwiseBalance(dinner, "alice", "charlie")).toBe(1000);
  });

  it("should be antisymmetric", () => {
    expect(pairwiseBalance(dinner, "bob", "alice")).toBe(-1000);
    expect(pairwiseBalance(dinner, "alice", "bob") + pairwiseBalance(dinner, "bob", "alice")).toBe(0);
  });

  it("should be zero between two debtors", () => {
    expect(pairwiseBalance(dinner, "bob", "charlie")).toBe(0);
  });

  it("should split a debt across creditors in proportion to their credit", () => {
    const trip = makeTransaction({
      payers: { a: 6000, b: 4000 },
      splits: { a: 2000, b: 2000, c: 6000 },
    });

    // a is owed 4000, b is owed 2000, c owes 6000
    expect(netPositions(trip)).toEqual(
      new Map([
        ["a", 4000],
        ["b", 2000],
        ["c", -6000],
      ])
    );
    expect(pairwiseBalance(trip, "a", "c")).toBeCloseTo(4000, 6);
    expect(pairwiseBalance(trip, "b", "c")).toBeCloseTo(2000, 6);
    expect(pairwiseBalance(trip, "a", "b")).toBe(0);
  });

  it("should ignore a payer whose contribution matches their share", () => {
    const groceries = makeTransaction({
      payers: { alice: 6000, bob: 3000 },
      splits: { alice: 3000, bob: 3000, charlie: 3000 },
    });

    expect(pairwiseBalance(groceries, "alice", "charlie")).toBe(3000);
    expect(pairwiseBalance(groceries, "bob", "charlie")).toBe(0);
    expect(pairwiseBalance(groceries, "alice", "bob")).toBe(0);
  });

  it("should be zero when the only payer is the only participant", () => {
    const solo = makeTransaction({ payers: { alice: 1500 }, splits: { alice: 1500 } });
    expect(pairwiseBalance(solo, "alice", "bob")).toBe(0);
  });

  it("should fall back to the legacy single payer", () => {
    const legacy = {
      ...makeTransaction({ payers: [], splits: { alice: 1000, bob: 1000 } }),
      legacyPayerId: "alice",
    };

    expect(pairwiseBalance(legacy, "alice", "bob")).toBe(1000);
  });

  it("should throw for the same participant on both sides", () => {
    expect(() => pairwiseBalance(dinner, "alice", "alice")).toThrow(InvalidParticipantPairError);
  });
});
