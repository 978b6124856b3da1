import { beforeEach, describe, it, expect } from "vitest";
import { sql } from "drizzle-orm";
import { createDatabase } from "../../src/storage/index.js";
import type { AppDatabase } from "../../src/storage/index.js";
import { createServices } from "../../src/services/index.js";
import type { Services } from "../../src/services/index.js";
import {
  InvalidParticipantPairError,
  NoOutstandingBalanceError,
  NotFoundError,
} from "../../src/engine/index.js";

async function addEqualExpense(
  services: Services,
  paidBy: string,
  totalAmount: number,
  participants: string[],
  extra: { currency?: string; groupId?: string } = {}
) {
  await services.transactions.createTransaction({
    title: "Expense",
    totalAmount,
    splitMethod: "equal",
    participants,
    paidBy,
    createdBy: paidBy,
    ...extra,
  });
}

describe("SettlementService", () => {
  let db: AppDatabase;
  let services: Services;

  beforeEach(() => {
    db = createDatabase(":memory:");
    services = createServices(db, "USD");
  });

  describe("settleUp", () => {
    it("should cap a payment larger than the balance", async () => {
      await addEqualExpense(services, "me", 8500, ["me", "bob"]);

      const result = await services.settlements.settleUp({ viewerId: "me", otherId: "bob", amount: 5000 });

      expect(result.capped).toBe(true);
      expect(result.requestedAmount).toBe(5000);
      expect(result.settlement).toMatchObject({
        from: "bob",
        to: "me",
        amount: 4250,
        currency: "USD",
        isFullSettlement: true,
      });
      expect((await services.balances.getPersonBalance("me", "bob")).get("USD")).toBe(0);
    });

    it("should reject once nothing is outstanding", async () => {
      await addEqualExpense(services, "me", 8500, ["me", "bob"]);
      await services.settlements.settleUp({ viewerId: "me", otherId: "bob" });

      await expect(
        services.settlements.settleUp({ viewerId: "me", otherId: "bob", amount: 100 })
      ).rejects.toBeInstanceOf(NoOutstandingBalanceError);
      expect((await services.balances.getSnapshot()).settlements.length).toBe(1);
    });

    it("should record a partial payment from the viewer", async () => {
      await addEqualExpense(services, "bob", 3000, ["me", "bob"]);

      const result = await services.settlements.settleUp({ viewerId: "me", otherId: "bob", amount: 1000 });

      expect(result.capped).toBe(false);
      expect(result.settlement).toMatchObject({ from: "me", to: "bob", amount: 1000, isFullSettlement: false });
      expect((await services.balances.getPersonBalance("me", "bob")).get("USD")).toBe(-500);
    });

    it("should match the currency regardless of case", async () => {
      await addEqualExpense(services, "me", 2000, ["me", "bob"], { currency: "EUR" });

      const result = await services.settlements.settleUp({ viewerId: "me", otherId: "bob", currency: "eur" });

      expect(result.settlement).toMatchObject({ currency: "EUR", amount: 1000 });
      expect((await services.balances.getPersonBalance("me", "bob")).entries()).toEqual([
        { code: "EUR", amount: 0 },
      ]);
    });

    it("should refuse to settle with yourself", async () => {
      await expect(
        services.settlements.settleUp({ viewerId: "me", otherId: "me" })
      ).rejects.toBeInstanceOf(InvalidParticipantPairError);
    });

    it("should only count the group's expenses when a group is given", async () => {
      await services.participants.createParticipant({ id: "alice", name: "Alice" });
      await services.groups.createGroup({
        id: "trip",
        name: "Trip",
        creatorId: "me",
        creatorName: "Me",
        members: ["alice"],
      });
      await addEqualExpense(services, "me", 2000, ["me", "alice"], { groupId: "trip" });
      await addEqualExpense(services, "me", 600, ["me", "alice"]);

      const result = await services.settlements.settleUp({ viewerId: "me", otherId: "alice", groupId: "trip" });

      expect(result.settlement.amount).toBe(1000);
      expect(result.settlement.groupId).toBe("trip");
      expect((await services.balances.getPersonBalance("me", "alice")).get("USD")).toBe(300);
    });

    it("should reject an unknown group", async () => {
      await expect(
        services.settlements.settleUp({ viewerId: "me", otherId: "bob", groupId: "nope" })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("settleAll", () => {
    beforeEach(async () => {
      await addEqualExpense(services, "me", 4000, ["me", "alice"]);
      await addEqualExpense(services, "bob", 3000, ["me", "bob"]);
      await addEqualExpense(services, "me", 1000, ["me", "carol"]);
    });

    it("should settle every balance in one batch", async () => {
      const settlements = await services.settlements.settleAll({ viewerId: "me" });

      expect(settlements.map(({ from, to, amount }) => ({ from, to, amount }))).toEqual([
        { from: "alice", to: "me", amount: 2000 },
        { from: "me", to: "bob", amount: 1500 },
        { from: "carol", to: "me", amount: 500 },
      ]);
      expect(settlements.every((settlement) => settlement.isFullSettlement)).toBe(true);

      const balances = await services.balances.getPersonBalances("me");
      expect(balances.every((entry) => entry.balance.isSettled)).toBe(true);
    });

    it("should limit the batch to the given people", async () => {
      const settlements = await services.settlements.settleAll({ viewerId: "me", participantIds: ["bob"] });

      expect(settlements.map((settlement) => settlement.to)).toEqual(["bob"]);
    });

    it("should settle each currency separately", async () => {
      await addEqualExpense(services, "alice", 1000, ["me", "alice"], { currency: "EUR" });

      const settlements = await services.settlements.settleAll({ viewerId: "me", participantIds: ["alice"] });

      expect(settlements.map(({ from, currency, amount }) => ({ from, currency, amount }))).toEqual([
        { from: "me", currency: "EUR", amount: 500 },
        { from: "alice", currency: "USD", amount: 2000 },
      ]);
    });

    it("should write nothing when one record fails", async () => {
      db.run(
        sql.raw(`CREATE TRIGGER reject_carol BEFORE INSERT ON settlements
                 WHEN NEW.from_id = 'carol'
                 BEGIN SELECT RAISE(ABORT, 'simulated failure'); END`)
      );

      await expect(services.settlements.settleAll({ viewerId: "me" })).rejects.toThrow();
      expect((await services.balances.getSnapshot()).settlements).toEqual([]);
    });

    it("should return nothing when everything is settled", async () => {
      await services.settlements.settleAll({ viewerId: "me" });

      expect(await services.settlements.settleAll({ viewerId: "me" })).toEqual([]);
    });
  });
});
