import { asc, desc, eq, inArray } from "drizzle-orm";
import type { Executor } from "../db.js";
import { transactions, transactionPayers, transactionSplits } from "../schema.js";
import type { PayerContribution, SplitShare, Transaction } from "../../types/index.js";

type TransactionRow = typeof transactions.$inferSelect;

export class TransactionRepo {
  constructor(
    private readonly db: Executor,
    private readonly defaultCurrency: string
  ) {}

  create(transaction: Transaction): Transaction {
    this.db
      .insert(transactions)
      .values({
        id: transaction.id,
        title: transaction.title,
        totalAmount: transaction.totalAmount,
        currency: transaction.currency,
        date: transaction.date,
        splitMethod: transaction.splitMethod,
        note: transaction.note,
        groupId: transaction.groupId,
        payerId: transaction.legacyPayerId,
        createdBy: transaction.createdBy,
      })
      .run();

    this.insertDetails(transaction.id, transaction.payers, transaction.splits);
    return transaction;
  }

  /** Replace the row and its payers and splits in place. */
  update(transaction: Transaction): Transaction {
    this.db
      .update(transactions)
      .set({
        title: transaction.title,
        totalAmount: transaction.totalAmount,
        currency: transaction.currency,
        date: transaction.date,
        splitMethod: transaction.splitMethod,
        note: transaction.note ?? null,
        groupId: transaction.groupId ?? null,
        payerId: null,
      })
      .where(eq(transactions.id, transaction.id))
      .run();

    this.db.delete(transactionPayers).where(eq(transactionPayers.transactionId, transaction.id)).run();
    this.db.delete(transactionSplits).where(eq(transactionSplits.transactionId, transaction.id)).run();
    this.insertDetails(transaction.id, transaction.payers, transaction.splits);

    return transaction;
  }

  findById(id: string): Transaction | null {
    const row = this.db.select().from(transactions).where(eq(transactions.id, id)).get();
    if (!row) return null;
    return this.hydrate([row])[0] ?? null;
  }

  findAll(): Transaction[] {
    const rows = this.db.select().from(transactions).orderBy(desc(transactions.date)).all();
    return this.hydrate(rows);
  }

  findByGroupId(groupId: string): Transaction[] {
    const rows = this.db
      .select()
      .from(transactions)
      .where(eq(transactions.groupId, groupId))
      .orderBy(desc(transactions.date))
      .all();
    return this.hydrate(rows);
  }

  delete(id: string): void {
    // Payers and splits go with it (ON DELETE CASCADE)
    this.db.delete(transactions).where(eq(transactions.id, id)).run();
  }

  private insertDetails(
    transactionId: string,
    payers: readonly PayerContribution[],
    splits: readonly SplitShare[]
  ): void {
    if (payers.length > 0) {
      this.db
        .insert(transactionPayers)
        .values(
          payers.map((payer) => ({
            transactionId,
            participantId: payer.participantId,
            amount: payer.amount,
          }))
        )
        .run();
    }

    if (splits.length > 0) {
      this.db
        .insert(transactionSplits)
        .values(
          splits.map((split) => ({
            transactionId,
            participantId: split.participantId,
            amount: split.amount,
            rawInput: split.rawInput,
          }))
        )
        .run();
    }
  }

  private hydrate(rows: readonly TransactionRow[]): Transaction[] {
    if (rows.length === 0) return [];

    const ids = rows.map((row) => row.id);

    const payersById = new Map<string, PayerContribution[]>();
    const payerRows = this.db
      .select()
      .from(transactionPayers)
      .where(inArray(transactionPayers.transactionId, ids))
      .orderBy(asc(transactionPayers.participantId))
      .all();
    for (const payer of payerRows) {
      const list = payersById.get(payer.transactionId) ?? [];
      list.push({ participantId: payer.participantId, amount: payer.amount });
      payersById.set(payer.transactionId, list);
    }

    const splitsById = new Map<string, SplitShare[]>();
    const splitRows = this.db
      .select()
      .from(transactionSplits)
      .where(inArray(transactionSplits.transactionId, ids))
      .orderBy(asc(transactionSplits.participantId))
      .all();
    for (const split of splitRows) {
      const list = splitsById.get(split.transactionId) ?? [];
      list.push({
        participantId: split.participantId,
        amount: split.amount,
        rawInput: split.rawInput,
      });
      splitsById.set(split.transactionId, list);
    }

    return rows.map((row) => ({
      id: row.id,
      title: row.title,
      totalAmount: row.totalAmount,
      currency: row.currency ?? this.defaultCurrency,
      date: row.date,
      splitMethod: row.splitMethod,
      payers: payersById.get(row.id) ?? [],
      splits: splitsById.get(row.id) ?? [],
      note: row.note ?? undefined,
      groupId: row.groupId ?? undefined,
      legacyPayerId: row.payerId ?? undefined,
      createdBy: row.createdBy,
    }));
  }
}
