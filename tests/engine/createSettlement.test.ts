import { describe, it, expect } from "vitest";
import {
  aggregateBalance,
  createSettlement,
  resolveSettlementAmount,
  InvalidAmountError,
  NoOutstandingBalanceError,
} from "../../src/engine/index.js";
import { makeTransaction } from "../helpers/fixtures.js";

const base = {
  id: "stl1",
  viewerId: "me",
  otherId: "bob",
  currency: "USD",
  date: new Date("2024-03-01T00:00:00Z"),
};

describe("createSettlement", () => {
  it("should cap an over-settlement at the outstanding balance", () => {
    const result = createSettlement({ ...base, outstandingBalance: 4250, requestedAmount: 10000 });

    expect(result.capped).toBe(true);
    expect(result.requestedAmount).toBe(10000);
    expect(result.settlement).toEqual({
      id: "stl1",
      from: "bob",
      to: "me",
      amount: 4250,
      currency: "USD",
      date: base.date,
      note: undefined,
      isFullSettlement: true,
      groupId: undefined,
    });
  });

  it("should refuse a second settlement once the balance is cleared", () => {
    const dinner = makeTransaction({ payers: { me: 8500 }, splits: { me: 4250, bob: 4250 } });
    const first = createSettlement({
      ...base,
      outstandingBalance: aggregateBalance([dinner], [], "me", "bob").get("USD"),
      requestedAmount: 10000,
    });

    const remaining = aggregateBalance([dinner], [first.settlement], "me", "bob").get("USD");
    expect(remaining).toBe(0);
    expect(() => createSettlement({ ...base, outstandingBalance: remaining })).toThrow(
      NoOutstandingBalanceError
    );
  });

  it("should send money from the viewer when the viewer owes", () => {
    const { settlement } = createSettlement({ ...base, outstandingBalance: -1500 });

    expect(settlement.from).toBe("me");
    expect(settlement.to).toBe("bob");
    expect(settlement.amount).toBe(1500);
    expect(settlement.isFullSettlement).toBe(true);
  });

  it("should record a partial settlement", () => {
    const result = createSettlement({ ...base, outstandingBalance: 4250, requestedAmount: 1000 });

    expect(result.capped).toBe(false);
    expect(result.settlement.amount).toBe(1000);
    expect(result.settlement.isFullSettlement).toBe(false);
  });
});

describe("resolveSettlementAmount", () => {
  it("should treat one minor unit or less as settled", () => {
    expect(() => resolveSettlementAmount(1)).toThrow(NoOutstandingBalanceError);
    expect(() => resolveSettlementAmount(-0.5)).toThrow("There is no outstanding balance to settle");
  });

  it("should round a fractional outstanding balance", () => {
    expect(resolveSettlementAmount(333.3333).amount).toBe(333);
    expect(resolveSettlementAmount(1.5).amount).toBe(2);
  });

  it("should reject zero, negative and fractional requests", () => {
    expect(() => resolveSettlementAmount(1000, 0)).toThrow(InvalidAmountError);
    expect(() => resolveSettlementAmount(1000, -5)).toThrow(
      "Settlement amount must be greater than zero"
    );
    expect(() => resolveSettlementAmount(1000, 10.5)).toThrow(
      "Settlement amount must be a whole number of minor units"
    );
  });
});
