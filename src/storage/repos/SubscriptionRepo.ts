import { asc, desc, eq } from "drizzle-orm";
import type { Executor } from "../db.js";
import {
  subscriptions,
  subscriptionMembers,
  subscriptionPayments,
  subscriptionSettlements,
} from "../schema.js";
import type {
  Subscription,
  SubscriptionPayment,
  SubscriptionSettlement,
} from "../../types/index.js";

type SubscriptionRow = typeof subscriptions.$inferSelect;

export class SubscriptionRepo {
  constructor(
    private readonly db: Executor,
    private readonly defaultCurrency: string
  ) {}

  create(subscription: Subscription): Subscription {
    this.db
      .insert(subscriptions)
      .values({
        id: subscription.id,
        name: subscription.name,
        amount: subscription.amount,
        currency: subscription.currency,
        cycle: subscription.cycle,
        customCycleDays: subscription.customCycleDays,
        isShared: subscription.isShared,
        isActive: subscription.isActive,
        nextBillingDate: subscription.nextBillingDate,
        createdAt: subscription.createdAt,
      })
      .run();

    const subscribers = Array.from(new Set(subscription.subscribers));
    if (subscribers.length > 0) {
      this.db
        .insert(subscriptionMembers)
        .values(
          subscribers.map((participantId) => ({ subscriptionId: subscription.id, participantId }))
        )
        .run();
    }

    return { ...subscription, subscribers };
  }

  findById(id: string): Subscription | null {
    const row = this.db.select().from(subscriptions).where(eq(subscriptions.id, id)).get();
    return row ? this.toSubscription(row) : null;
  }

  findAll(): Subscription[] {
    return this.db
      .select()
      .from(subscriptions)
      .orderBy(asc(subscriptions.nextBillingDate))
      .all()
      .map((row) => this.toSubscription(row));
  }

  update(
    id: string,
    data: Partial<Pick<Subscription, "name" | "amount" | "isActive" | "isShared" | "nextBillingDate">>
  ): Subscription | null {
    this.db.update(subscriptions).set(data).where(eq(subscriptions.id, id)).run();
    return this.findById(id);
  }

  delete(id: string): void {
    this.db.delete(subscriptions).where(eq(subscriptions.id, id)).run();
  }

  addPayment(payment: SubscriptionPayment): SubscriptionPayment {
    this.db
      .insert(subscriptionPayments)
      .values({
        id: payment.id,
        subscriptionId: payment.subscriptionId,
        payerId: payment.payerId,
        amount: payment.amount,
        date: payment.date,
        note: payment.note,
      })
      .run();

    return payment;
  }

  findPayments(subscriptionId: string): SubscriptionPayment[] {
    return this.db
      .select()
      .from(subscriptionPayments)
      .where(eq(subscriptionPayments.subscriptionId, subscriptionId))
      .orderBy(desc(subscriptionPayments.date))
      .all()
      .map((row) => ({
        id: row.id,
        subscriptionId: row.subscriptionId,
        payerId: row.payerId,
        amount: row.amount,
        date: row.date,
        note: row.note ?? undefined,
      }));
  }

  addSettlement(settlement: SubscriptionSettlement): SubscriptionSettlement {
    this.db
      .insert(subscriptionSettlements)
      .values({
        id: settlement.id,
        subscriptionId: settlement.subscriptionId,
        fromId: settlement.from,
        toId: settlement.to,
        amount: settlement.amount,
        date: settlement.date,
        note: settlement.note,
      })
      .run();

    return settlement;
  }

  findSettlements(subscriptionId: string): SubscriptionSettlement[] {
    return this.db
      .select()
      .from(subscriptionSettlements)
      .where(eq(subscriptionSettlements.subscriptionId, subscriptionId))
      .orderBy(desc(subscriptionSettlements.date))
      .all()
      .map((row) => ({
        id: row.id,
        subscriptionId: row.subscriptionId,
        from: row.fromId,
        to: row.toId,
        amount: row.amount,
        date: row.date,
        note: row.note ?? undefined,
      }));
  }

  private toSubscription(row: SubscriptionRow): Subscription {
    const members = this.db
      .select({ participantId: subscriptionMembers.participantId })
      .from(subscriptionMembers)
      .where(eq(subscriptionMembers.subscriptionId, row.id))
      .all();

    return {
      id: row.id,
      name: row.name,
      amount: row.amount,
      currency: row.currency ?? this.defaultCurrency,
      cycle: row.cycle,
      customCycleDays: row.customCycleDays,
      isShared: row.isShared,
      isActive: row.isActive,
      subscribers: members.map((m) => m.participantId),
      nextBillingDate: row.nextBillingDate,
      createdAt: row.createdAt,
    };
  }
}
