import { beforeEach, describe, it, expect } from "vitest";
import { sql } from "drizzle-orm";
import { createDatabase } from "../../src/storage/index.js";
import type { AppDatabase } from "../../src/storage/index.js";
import { createServices } from "../../src/services/index.js";
import type { Services } from "../../src/services/index.js";
import {
  InvalidSplitInputError,
  InvalidTransactionError,
  NotFoundError,
} from "../../src/engine/index.js";

describe("TransactionService", () => {
  let db: AppDatabase;
  let services: Services;

  beforeEach(() => {
    db = createDatabase(":memory:");
    services = createServices(db, "USD");
  });

  function rejectSplitInserts() {
    db.run(
      sql.raw(`CREATE TRIGGER reject_splits BEFORE INSERT ON transaction_splits
               BEGIN SELECT RAISE(ABORT, 'simulated failure'); END`)
    );
  }

  describe("createTransaction", () => {
    it("should compute and store an equal split", async () => {
      const { transaction, warnings } = await services.transactions.createTransaction({
        title: "  Groceries ",
        totalAmount: 1000,
        splitMethod: "equal",
        participants: ["me", "bob", "carol"],
        paidBy: "me",
        createdBy: "me",
      });

      expect(warnings).toEqual([]);
      expect(transaction.title).toBe("Groceries");
      expect(transaction.currency).toBe("USD");
      expect(transaction.payers).toEqual([{ participantId: "me", amount: 1000 }]);
      expect(transaction.splits.map(({ participantId, amount }) => [participantId, amount])).toEqual([
        ["bob", 334],
        ["carol", 333],
        ["me", 333],
      ]);
      expect(await services.transactions.getTransaction(transaction.id)).toEqual(transaction);
    });

    it("should prefer explicit payers over a single payer", async () => {
      const { transaction } = await services.transactions.createTransaction({
        title: "Hotel",
        totalAmount: 1000,
        splitMethod: "equal",
        participants: ["me", "bob"],
        payers: [
          { participantId: "bob", amount: 400 },
          { participantId: "me", amount: 600 },
        ],
        paidBy: "carol",
        createdBy: "me",
      });

      expect(transaction.payers.map((payer) => payer.participantId)).toEqual(["bob", "me"]);
    });

    it("should require a payer", async () => {
      await expect(
        services.transactions.createTransaction({
          title: "Taxi",
          totalAmount: 1000,
          splitMethod: "equal",
          participants: ["me", "bob"],
          createdBy: "me",
        })
      ).rejects.toThrow(new InvalidTransactionError("Select at least one payer"));
    });

    it("should reject payer amounts that miss the total", async () => {
      await expect(
        services.transactions.createTransaction({
          title: "Taxi",
          totalAmount: 1000,
          splitMethod: "equal",
          participants: ["me", "bob"],
          payers: [{ participantId: "me", amount: 900 }],
          createdBy: "me",
        })
      ).rejects.toThrow("Paid-by amounts must equal the total");
    });

    it("should reject exact amounts that miss the total", async () => {
      await expect(
        services.transactions.createTransaction({
          title: "Taxi",
          totalAmount: 1000,
          splitMethod: "amount",
          participants: ["me", "bob"],
          rawInputs: { me: 500, bob: 400 },
          paidBy: "me",
          createdBy: "me",
        })
      ).rejects.toBeInstanceOf(InvalidSplitInputError);
      expect(await services.transactions.getTransactions()).toEqual([]);
    });

    it("should write nothing when the split rows fail to insert", async () => {
      rejectSplitInserts();

      await expect(
        services.transactions.createTransaction({
          id: "t1",
          title: "Dinner",
          totalAmount: 3000,
          splitMethod: "equal",
          participants: ["me", "bob"],
          paidBy: "me",
          createdBy: "me",
        })
      ).rejects.toThrow();
      expect(await services.transactions.getTransaction("t1")).toBeNull();
    });

    it("should upper-case the currency code", async () => {
      const { transaction } = await services.transactions.createTransaction({
        title: "Museum",
        totalAmount: 2000,
        currency: "eur",
        splitMethod: "equal",
        participants: ["me", "bob"],
        paidBy: "me",
        createdBy: "me",
      });

      expect(transaction.currency).toBe("EUR");
    });

    it("should reject an unknown group", async () => {
      await expect(
        services.transactions.createTransaction({
          title: "Taxi",
          totalAmount: 1000,
          splitMethod: "equal",
          participants: ["me"],
          paidBy: "me",
          groupId: "missing",
          createdBy: "me",
        })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("updateTransaction", () => {
    async function createDinner() {
      const { transaction } = await services.transactions.createTransaction({
        title: "Dinner",
        totalAmount: 2000,
        splitMethod: "equal",
        participants: ["me", "bob"],
        paidBy: "me",
        createdBy: "me",
      });
      return transaction;
    }

    it("should rescale splits and payers to a new total", async () => {
      const dinner = await createDinner();

      const { transaction } = await services.transactions.updateTransaction(dinner.id, { totalAmount: 3000 });

      expect(transaction.splits.map((split) => split.amount)).toEqual([1500, 1500]);
      expect(transaction.payers).toEqual([{ participantId: "me", amount: 3000 }]);
      expect((await services.transactions.getTransaction(dinner.id))?.totalAmount).toBe(3000);
    });

    it("should recompute splits from new inputs", async () => {
      const dinner = await createDinner();

      const { transaction } = await services.transactions.updateTransaction(dinner.id, {
        split: { method: "amount", participants: ["me", "bob"], rawInputs: { me: 500, bob: 1500 } },
      });

      expect(transaction.splitMethod).toBe("amount");
      expect(transaction.splits.map(({ participantId, amount }) => [participantId, amount])).toEqual([
        ["bob", 1500],
        ["me", 500],
      ]);
    });

    it("should keep the saved splits when the new ones fail to insert", async () => {
      const dinner = await createDinner();
      rejectSplitInserts();

      await expect(
        services.transactions.updateTransaction(dinner.id, { totalAmount: 3000 })
      ).rejects.toThrow();

      const stored = await services.transactions.getTransaction(dinner.id);
      expect(stored?.totalAmount).toBe(2000);
      expect(stored?.payers).toEqual([{ participantId: "me", amount: 2000 }]);
      expect(stored?.splits.map((split) => split.amount)).toEqual([1000, 1000]);
    });

    it("should remove the note when it is cleared", async () => {
      const dinner = await createDinner();
      await services.transactions.updateTransaction(dinner.id, { note: "Birthday" });

      const kept = await services.transactions.updateTransaction(dinner.id, { title: "Birthday dinner" });
      expect(kept.transaction.note).toBe("Birthday");

      await services.transactions.updateTransaction(dinner.id, { note: null });
      expect((await services.transactions.getTransaction(dinner.id))?.note).toBeUndefined();

      await services.transactions.updateTransaction(dinner.id, { note: "Again" });
      await services.transactions.updateTransaction(dinner.id, { note: "" });
      expect((await services.transactions.getTransaction(dinner.id))?.note).toBeUndefined();
    });

    it("should reject an unknown transaction", async () => {
      await expect(
        services.transactions.updateTransaction("missing", { title: "Lunch" })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("deleteTransaction", () => {
    it("should remove the transaction once", async () => {
      const { transaction } = await services.transactions.createTransaction({
        title: "Snacks",
        totalAmount: 500,
        splitMethod: "equal",
        participants: ["me", "bob"],
        paidBy: "bob",
        createdBy: "bob",
      });

      await services.transactions.deleteTransaction(transaction.id);

      expect(await services.transactions.getTransaction(transaction.id)).toBeNull();
      await expect(services.transactions.deleteTransaction(transaction.id)).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });
});
