import { desc, eq } from "drizzle-orm";
import type { Executor } from "../db.js";
import { settlements } from "../schema.js";
import type { Settlement } from "../../types/index.js";

type SettlementRow = typeof settlements.$inferSelect;

export class SettlementRepo {
  constructor(
    private readonly db: Executor,
    private readonly defaultCurrency: string
  ) {}

  create(settlement: Settlement): Settlement {
    this.db
      .insert(settlements)
      .values({
        id: settlement.id,
        fromId: settlement.from,
        toId: settlement.to,
        amount: settlement.amount,
        currency: settlement.currency,
        date: settlement.date,
        note: settlement.note,
        isFullSettlement: settlement.isFullSettlement,
        groupId: settlement.groupId,
      })
      .run();

    return settlement;
  }

  findById(id: string): Settlement | null {
    const row = this.db.select().from(settlements).where(eq(settlements.id, id)).get();
    return row ? this.toSettlement(row) : null;
  }

  findAll(): Settlement[] {
    return this.db
      .select()
      .from(settlements)
      .orderBy(desc(settlements.date))
      .all()
      .map((row) => this.toSettlement(row));
  }

  findByGroupId(groupId: string): Settlement[] {
    return this.db
      .select()
      .from(settlements)
      .where(eq(settlements.groupId, groupId))
      .orderBy(desc(settlements.date))
      .all()
      .map((row) => this.toSettlement(row));
  }

  delete(id: string): void {
    this.db.delete(settlements).where(eq(settlements.id, id)).run();
  }

  private toSettlement(row: SettlementRow): Settlement {
    return {
      id: row.id,
      from: row.fromId,
      to: row.toId,
      amount: row.amount,
      currency: row.currency ?? this.defaultCurrency,
      date: row.date,
      note: row.note ?? undefined,
      isFullSettlement: row.isFullSettlement,
      groupId: row.groupId ?? undefined,
    };
  }
}
